// src/constraints/evaluator.ts

import type { ExecutionContext } from '../core/execution-context.js';
import type { ConstraintEvaluator } from '../core/types.js';
import type { Constructor, MetaConstraint } from '../metadata/types.js';
import { DefaultMessageInterpolator, type MessageInterpolator } from './message-interpolator.js';

export class DefaultConstraintEvaluator implements ConstraintEvaluator {
  constructor(
    private readonly messageInterpolator: MessageInterpolator = new DefaultMessageInterpolator()
  ) {}

  evaluate<T>(
    metaConstraint: MetaConstraint,
    _beanClass: Constructor,
    value: unknown,
    context: ExecutionContext<T>
  ): void {
    const { constraint } = metaConstraint;
    if (constraint.isValid(value)) {
      return;
    }

    context.addConstraintFailure({
      constraint: constraint.name,
      messageTemplate: constraint.messageTemplate,
      message: this.messageInterpolator.interpolate(constraint.messageTemplate, constraint, value),
      invalidValue: value
    });
  }
}
