// src/utils/error-factory.ts

import {
  ConfigurationError,
  ConstraintEvaluationError,
  GroupDefinitionError,
  ValidationUsageError
} from './errors.js';

export type ErrorKind = 'usage' | 'group-definition' | 'evaluation' | 'configuration' | 'unknown';

export interface ErrorDetails {
  kind: ErrorKind;
  message: string;
  stack?: string;
  timestamp: string;
  suggestion?: string;
}

export class ErrorFactory {
  static describe(error: unknown): ErrorDetails {
    const details: ErrorDetails = {
      kind: this.classify(error),
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      timestamp: new Date().toISOString()
    };

    const suggestion = this.getSuggestion(error);
    if (suggestion) {
      details.suggestion = suggestion;
    }

    return details;
  }

  private static classify(error: unknown): ErrorKind {
    if (error instanceof ValidationUsageError) return 'usage';
    if (error instanceof GroupDefinitionError) return 'group-definition';
    if (error instanceof ConstraintEvaluationError) return 'evaluation';
    if (error instanceof ConfigurationError) return 'configuration';
    return 'unknown';
  }

  private static getSuggestion(error: unknown): string | undefined {
    if (error instanceof GroupDefinitionError && error.group === undefined) {
      return 'Check that every sequence in .graph-validator/config.yml lists declared groups and never contains itself.';
    }

    if (error instanceof GroupDefinitionError) {
      return `Declare "${error.group}" under "groups" or "sequences" in .graph-validator/config.yml, and make sure no sequence contains itself.`;
    }

    if (error instanceof ConstraintEvaluationError) {
      return `Constraint "${error.constraint}" threw while checking "${error.propertyPath}". Check that it is mapped to a property of a compatible type.`;
    }

    if (error instanceof ConfigurationError) {
      return 'Check YAML syntax and field names in the configuration file.';
    }

    if (error instanceof ValidationUsageError && error.message.includes('path')) {
      return 'Property paths use "." for nesting and "[index]" for elements, e.g. orders[2].lines[0].amount';
    }

    return undefined;
  }
}
