// src/constraints/message-interpolator.ts

import type { ConstraintDefinition } from '../metadata/types.js';
import { interpolateTemplate } from '../utils/template-interpolator.js';

export interface MessageInterpolator {
  interpolate(messageTemplate: string, constraint: ConstraintDefinition, validatedValue: unknown): string;
}

/**
 * Fills {{name}} placeholders from the constraint's attributes.
 * {{validatedValue}} refers to the value that failed.
 */
export class DefaultMessageInterpolator implements MessageInterpolator {
  interpolate(messageTemplate: string, constraint: ConstraintDefinition, validatedValue: unknown): string {
    return interpolateTemplate(messageTemplate, {
      ...constraint.attributes,
      validatedValue
    });
  }
}
