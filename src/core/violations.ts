// src/core/violations.ts

import type { Constructor } from '../metadata/types.js';

/**
 * A failed constraint, reported at the property path where it occurred.
 */
export interface ConstraintViolation<T> {
  readonly message: string;
  readonly messageTemplate: string;
  /** Name of the failed constraint */
  readonly constraint: string;
  /** Undefined for validateValue, which has no containing instance */
  readonly rootBean: T | undefined;
  readonly rootBeanClass: Constructor;
  readonly leafBean: object | undefined;
  readonly propertyPath: string;
  readonly invalidValue: unknown;
  /** Group that was being validated when the constraint failed */
  readonly group: string;
}

function sameViolation<T>(a: ConstraintViolation<T>, b: ConstraintViolation<T>): boolean {
  return a.message === b.message &&
    a.messageTemplate === b.messageTemplate &&
    a.constraint === b.constraint &&
    a.propertyPath === b.propertyPath &&
    a.rootBean === b.rootBean &&
    a.leafBean === b.leafBean &&
    Object.is(a.invalidValue, b.invalidValue);
}

/**
 * Collapse violations reported more than once (typically once per group
 * that shares the constraint) into a set. The first occurrence is kept.
 */
export function toViolationSet<T>(violations: readonly ConstraintViolation<T>[]): Set<ConstraintViolation<T>> {
  const byPath = new Map<string, ConstraintViolation<T>[]>();
  const result = new Set<ConstraintViolation<T>>();

  for (const violation of violations) {
    const key = `${violation.propertyPath}\u0000${violation.constraint}`;
    const bucket = byPath.get(key) ?? [];
    if (bucket.some(existing => sameViolation(existing, violation))) {
      continue;
    }
    bucket.push(violation);
    byPath.set(key, bucket);
    result.add(violation);
  }

  return result;
}

export function formatViolation<T>(violation: ConstraintViolation<T>): string {
  const path = violation.propertyPath === '' ? '<root>' : violation.propertyPath;
  return `${path}: ${violation.message}`;
}
