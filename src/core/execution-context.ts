// src/core/execution-context.ts

import { classOf, type Constructor } from '../metadata/types.js';
import { DEFAULT_GROUP } from './groups/group.js';
import { renderPropertyPath } from './property-path-cursor.js';
import type { ConstraintViolation } from './violations.js';

interface ValidatedObject {
  readonly object: object;
  readonly type: Constructor;
}

interface PropertySegment {
  name: string;
  indexed: boolean;
  index?: string;
}

export interface ConstraintFailure {
  constraint: string;
  message: string;
  messageTemplate: string;
  invalidValue: unknown;
}

/**
 * Traversal state of one validation request.
 *
 * Holds the stack of objects being validated (one entry per cascade level),
 * the current property path, the current group, the objects already
 * validated per group and the violations found so far. A context is
 * created per call and never shared.
 */
export class ExecutionContext<T> {
  private readonly validatedObjects: ValidatedObject[] = [];
  private readonly propertyPath: PropertySegment[] = [];
  private readonly processedObjects = new Map<string, WeakSet<object>>();
  private readonly failingConstraints: ConstraintViolation<T>[] = [];
  private currentGroup: string = DEFAULT_GROUP;
  private currentSequence: string | undefined;

  private constructor(
    readonly rootBeanClass: Constructor,
    readonly rootBean: T | undefined
  ) {}

  static forBean<T extends object>(rootBean: T): ExecutionContext<T> {
    const context = new ExecutionContext<T>(classOf(rootBean), rootBean);
    context.pushValidatedObject(rootBean);
    return context;
  }

  /**
   * Context without a containing instance, for validating standalone values
   */
  static forClass<T>(rootBeanClass: Constructor<T>): ExecutionContext<T> {
    return new ExecutionContext<T>(rootBeanClass, undefined);
  }

  // ---------------------------------------------------------------------------
  // Groups
  // ---------------------------------------------------------------------------

  getCurrentGroup(): string {
    return this.currentGroup;
  }

  /**
   * Switch to the next group of the chain. Processed objects are tracked
   * per chain entry, so a group repeated inside a sequence run walks the
   * graph again.
   */
  setCurrentGroup(group: string, sequence?: string): void {
    this.currentGroup = group;
    this.currentSequence = sequence;
  }

  getCurrentSequence(): string | undefined {
    return this.currentSequence;
  }

  needsValidation(groups: ReadonlySet<string>): boolean {
    return groups.has(this.currentGroup);
  }

  // ---------------------------------------------------------------------------
  // Validated object stack
  // ---------------------------------------------------------------------------

  pushValidatedObject(object: object): void {
    this.validatedObjects.push({ object, type: classOf(object) });
  }

  popValidatedObject(): object | undefined {
    return this.validatedObjects.pop()?.object;
  }

  peekValidatedObject(): object | undefined {
    return this.validatedObjects[this.validatedObjects.length - 1]?.object;
  }

  peekValidatedObjectType(): Constructor | undefined {
    return this.validatedObjects[this.validatedObjects.length - 1]?.type;
  }

  withValidatedObject<R>(object: object, fn: () => R): R {
    this.pushValidatedObject(object);
    try {
      return fn();
    } finally {
      this.popValidatedObject();
    }
  }

  /**
   * Whether `value` was already validated under the current chain entry.
   * Compared by identity; primitives are never recorded.
   */
  isProcessedForCurrentGroup(value: unknown): boolean {
    if (typeof value !== 'object' || value === null) {
      return false;
    }
    return this.processedObjects.get(this.processedKey())?.has(value) ?? false;
  }

  /**
   * Record the object on top of the stack as validated for the current chain entry
   */
  markProcessedForCurrentGroup(): void {
    const object = this.peekValidatedObject();
    if (object === undefined) return;

    const key = this.processedKey();
    let processed = this.processedObjects.get(key);
    if (!processed) {
      processed = new WeakSet<object>();
      this.processedObjects.set(key, processed);
    }
    processed.add(object);
  }

  private processedKey(): string {
    return `${this.currentGroup}\u0000${this.currentSequence ?? ''}`;
  }

  // ---------------------------------------------------------------------------
  // Property path
  // ---------------------------------------------------------------------------

  pushProperty(name: string): void {
    this.propertyPath.push({ name, indexed: false });
  }

  popProperty(): void {
    this.propertyPath.pop();
  }

  withProperty<R>(name: string, fn: () => R): R {
    this.pushProperty(name);
    try {
      return fn();
    } finally {
      this.popProperty();
    }
  }

  /**
   * Mark the deepest segment as indexed. The concrete index is filled in
   * per element with replacePropertyIndex().
   */
  appendIndexToPropertyPath(): void {
    const last = this.propertyPath[this.propertyPath.length - 1];
    if (last) {
      last.indexed = true;
      last.index = undefined;
    }
  }

  /**
   * Set the index of the most recently appended indexed segment
   */
  replacePropertyIndex(index: string): void {
    for (let i = this.propertyPath.length - 1; i >= 0; i--) {
      const segment = this.propertyPath[i];
      if (segment.indexed) {
        segment.index = index;
        return;
      }
    }
  }

  getPropertyPath(): string {
    return renderPropertyPath(
      this.propertyPath.map(segment =>
        segment.indexed && segment.index !== undefined
          ? { name: segment.name, index: segment.index }
          : { name: segment.name }
      )
    );
  }

  getPropertyDepth(): number {
    return this.propertyPath.length;
  }

  getValidatedObjectDepth(): number {
    return this.validatedObjects.length;
  }

  // ---------------------------------------------------------------------------
  // Violations
  // ---------------------------------------------------------------------------

  addConstraintFailure(failure: ConstraintFailure): void {
    this.failingConstraints.push({
      message: failure.message,
      messageTemplate: failure.messageTemplate,
      constraint: failure.constraint,
      rootBean: this.rootBean,
      rootBeanClass: this.rootBeanClass,
      leafBean: this.peekValidatedObject(),
      propertyPath: this.getPropertyPath(),
      invalidValue: failure.invalidValue,
      group: this.currentGroup
    });
  }

  /**
   * Violations recorded so far. This is the live list, not a copy.
   */
  getFailingConstraints(): ConstraintViolation<T>[] {
    return this.failingConstraints;
  }

  getViolationCount(): number {
    return this.failingConstraints.length;
  }
}
