// src/constraints/builtin.ts

import type { ConstraintDefinition } from '../metadata/types.js';

function define(
  name: string,
  messageTemplate: string,
  attributes: Record<string, unknown>,
  isValid: (value: unknown) => boolean
): ConstraintDefinition {
  return Object.freeze({
    name,
    messageTemplate,
    attributes: Object.freeze({ ...attributes }),
    isValid
  });
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Length of a string or array, size of a Map or Set. Throws for anything
 * else, which surfaces as an evaluation error.
 */
function sizeOf(value: unknown, constraint: string): number {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length;
  }
  if (value instanceof Map || value instanceof Set) {
    return value.size;
  }
  throw new TypeError(`${constraint} cannot be applied to a value of type ${typeof value}`);
}

function toComparable(value: unknown, constraint: string): number {
  if (typeof value === 'number') {
    return value;
  }
  throw new TypeError(`${constraint} cannot be applied to a value of type ${typeof value}`);
}

export function notNull(messageTemplate = 'must not be null'): ConstraintDefinition {
  return define('NotNull', messageTemplate, {}, value => !isAbsent(value));
}

export function notEmpty(messageTemplate = 'must not be empty'): ConstraintDefinition {
  return define('NotEmpty', messageTemplate, {}, value =>
    !isAbsent(value) && sizeOf(value, 'NotEmpty') > 0
  );
}

export interface SizeOptions {
  min?: number;
  max?: number;
  message?: string;
}

export function size(options: SizeOptions = {}): ConstraintDefinition {
  const min = options.min ?? 0;
  const max = options.max ?? Number.MAX_SAFE_INTEGER;
  return define(
    'Size',
    options.message ?? 'size must be between {{min}} and {{max}}',
    { min, max },
    value => {
      if (isAbsent(value)) return true;
      const length = sizeOf(value, 'Size');
      return length >= min && length <= max;
    }
  );
}

export function min(limit: number, messageTemplate = 'must be greater than or equal to {{value}}'): ConstraintDefinition {
  return define('Min', messageTemplate, { value: limit }, value =>
    isAbsent(value) || toComparable(value, 'Min') >= limit
  );
}

export function max(limit: number, messageTemplate = 'must be less than or equal to {{value}}'): ConstraintDefinition {
  return define('Max', messageTemplate, { value: limit }, value =>
    isAbsent(value) || toComparable(value, 'Max') <= limit
  );
}

/**
 * The whole string has to match `regexp`.
 */
export function pattern(regexp: RegExp | string, messageTemplate = 'must match "{{regexp}}"'): ConstraintDefinition {
  const source = typeof regexp === 'string' ? regexp : regexp.source;
  const flags = typeof regexp === 'string' ? '' : regexp.flags.replace(/[gy]/g, '');
  const anchored = new RegExp(`^(?:${source})$`, flags);
  return define('Pattern', messageTemplate, { regexp: source }, value => {
    if (isAbsent(value)) return true;
    if (typeof value !== 'string') {
      throw new TypeError(`Pattern cannot be applied to a value of type ${typeof value}`);
    }
    return anchored.test(value);
  });
}

export function assertTrue(messageTemplate = 'must be true'): ConstraintDefinition {
  return define('AssertTrue', messageTemplate, {}, value => isAbsent(value) || value === true);
}

/**
 * Custom rule. `attributes` are available to the message template.
 */
export function constraint(
  name: string,
  isValid: (value: unknown) => boolean,
  messageTemplate = 'is invalid',
  attributes: Record<string, unknown> = {}
): ConstraintDefinition {
  return define(name, messageTemplate, attributes, isValid);
}
