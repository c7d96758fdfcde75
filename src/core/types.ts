// src/core/types.ts

import type { Constructor, MetaConstraint } from '../metadata/types.js';
import type { ExecutionContext } from './execution-context.js';
import type { ConstraintViolation } from './violations.js';

/**
 * Runs a single constraint and appends a violation to the context when it
 * fails. Anything thrown here aborts the validation call.
 */
export interface ConstraintEvaluator {
  evaluate<T>(
    metaConstraint: MetaConstraint,
    beanClass: Constructor,
    value: unknown,
    context: ExecutionContext<T>
  ): void;
}

export interface Validator {
  /**
   * Validate `object` and everything reachable from it through cascaded
   * members. With no groups, the Default group is validated.
   */
  validate<T extends object>(object: T, ...groups: string[]): Set<ConstraintViolation<T>>;

  /**
   * Validate the constraints at `propertyPath` of a live object, without
   * cascading past the property.
   */
  validateProperty<T extends object>(
    object: T,
    propertyPath: string,
    ...groups: string[]
  ): Set<ConstraintViolation<T>>;

  /**
   * Validate `value` as if it were held at `propertyPath` of a `beanClass`
   * instance.
   */
  validateValue<T>(
    beanClass: Constructor<T>,
    propertyPath: string,
    value: unknown,
    ...groups: string[]
  ): Set<ConstraintViolation<T>>;
}
