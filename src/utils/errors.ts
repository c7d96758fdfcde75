// src/utils/errors.ts

/**
 * Raised when a validation request is malformed: a missing object or class,
 * an empty group list, or a property path that cannot be parsed.
 */
export class ValidationUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationUsageError';
  }
}

/**
 * Raised before any constraint runs when a requested group cannot be resolved
 * or a group sequence references itself.
 */
export class GroupDefinitionError extends Error {
  constructor(
    message: string,
    public readonly group?: string
  ) {
    super(message);
    this.name = 'GroupDefinitionError';
  }
}

/**
 * Wraps anything thrown by a constraint evaluator. Validation of the current
 * request stops at the first one.
 */
export class ConstraintEvaluationError extends Error {
  constructor(
    public readonly constraint: string,
    public readonly propertyPath: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`[${constraint}] evaluation failed at "${propertyPath}": ${reason}`, { cause });
    this.name = 'ConstraintEvaluationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
