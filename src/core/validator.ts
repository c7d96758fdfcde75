// src/core/validator.ts

import { Logger } from '../utils/logger.js';
import { ConstraintEvaluationError, ValidationUsageError } from '../utils/errors.js';
import { beanClassOf, getIndexedType, isArray, isCollection } from '../metadata/type-descriptors.js';
import {
  classOf,
  type CascadedMember,
  type Constructor,
  type MetaConstraint,
  type MetadataProvider,
  type TypeDescriptor
} from '../metadata/types.js';
import { ExecutionContext } from './execution-context.js';
import { DEFAULT_GROUP } from './groups/group.js';
import type { GroupChain } from './groups/group-chain.js';
import { GroupChainGenerator } from './groups/group-chain-generator.js';
import { GroupDefinitions } from './groups/group-definitions.js';
import { PropertyPathCursor } from './property-path-cursor.js';
import type { ConstraintEvaluator, Validator } from './types.js';
import { toViolationSet, type ConstraintViolation } from './violations.js';

interface CascadedElement {
  readonly value: unknown;
  /** Path index of the element; undefined for a single, non-indexed value */
  readonly index?: string;
}

/**
 * Path index for a map entry. String, integer and bigint keys render as
 * themselves; any other key renders as the entry's 0-based position.
 */
export function renderMapKey(key: unknown, position: number): string {
  if (typeof key === 'string' || typeof key === 'bigint') {
    return String(key);
  }
  if (typeof key === 'number' && Number.isInteger(key)) {
    return String(key);
  }
  return String(position);
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function';
}

function notIndexable(propertyName: string, value: unknown, expected: string): ValidationUsageError {
  return new ValidationUsageError(
    `Cascaded property "${propertyName}" is declared as ${expected} but holds a value of type ${typeof value}`
  );
}

function* collectionElements(
  value: unknown,
  propertyName: string,
  kind: TypeDescriptor['kind']
): Generator<CascadedElement> {
  if (value instanceof Map) {
    let position = 0;
    for (const [key, entryValue] of value) {
      yield { value: entryValue, index: renderMapKey(key, position) };
      position++;
    }
    return;
  }

  if (isIterable(value)) {
    let position = 0;
    for (const element of value) {
      yield { value: element, index: String(position) };
      position++;
    }
    return;
  }

  // Plain records stand in for maps only
  if (kind === 'map' && typeof value === 'object' && value !== null) {
    for (const [key, entryValue] of Object.entries(value)) {
      yield { value: entryValue, index: key };
    }
    return;
  }

  throw notIndexable(propertyName, value, kind === 'map' ? 'a map' : 'a collection');
}

function* arrayElements(value: unknown, propertyName: string): Generator<CascadedElement> {
  const elements: readonly unknown[] | undefined = Array.isArray(value)
    ? value
    : isIterable(value) ? Array.from(value) : undefined;

  if (elements === undefined) {
    throw notIndexable(propertyName, value, 'an array');
  }

  for (let position = 0; position < elements.length; position++) {
    yield { value: elements[position], index: String(position) };
  }
}

/**
 * Element of a live container addressed by a path index, matching the way
 * indexes are rendered during cascading.
 */
function elementAt(container: unknown, index: string): unknown {
  const position = /^\d+$/.test(index) ? Number(index) : undefined;

  if (container instanceof Map) {
    let entryPosition = 0;
    for (const [key, value] of container) {
      if (renderMapKey(key, entryPosition) === index) {
        return value;
      }
      entryPosition++;
    }
    return undefined;
  }

  if (Array.isArray(container) || isIterable(container)) {
    const elements: readonly unknown[] = Array.isArray(container) ? container : Array.from(container);
    return position !== undefined && position < elements.length ? elements[position] : undefined;
  }

  if (typeof container === 'object' && container !== null && Object.hasOwn(container, index)) {
    return Reflect.get(container, index);
  }

  return undefined;
}

function requireBean(object: unknown, message: string): void {
  if (object === null || object === undefined) {
    throw new ValidationUsageError(message);
  }
  if (typeof object !== 'object') {
    throw new ValidationUsageError(`Cannot validate a value of type ${typeof object}; an object is required`);
  }
}

/**
 * Validation engine.
 *
 * Resolves the requested groups into a GroupChain, validates the root
 * object's constraints group by group and cascades into nested beans,
 * arrays, collections and maps. Cascaded elements are validated under the
 * single group currently being processed; an object is validated at most
 * once per group, which keeps cyclic graphs finite.
 */
export class ValidatorImpl implements Validator {
  private readonly groupChainGenerator: GroupChainGenerator;

  constructor(
    private readonly metadataProvider: MetadataProvider,
    private readonly constraintEvaluator: ConstraintEvaluator,
    groupDefinitions: GroupDefinitions = GroupDefinitions.defaults()
  ) {
    this.groupChainGenerator = new GroupChainGenerator(groupDefinitions);
  }

  validate<T extends object>(object: T, ...groups: string[]): Set<ConstraintViolation<T>> {
    requireBean(object, 'Validation of a null object');

    const groupChain = this.resolveGroupChain(groups);
    const context = ExecutionContext.forBean(object);

    this.runGroupChain(groupChain, context, () => this.validateGroup(context));

    Logger.debug(
      `Validated ${context.rootBeanClass.name}: ${context.getViolationCount()} violation(s)`
    );
    return toViolationSet(context.getFailingConstraints());
  }

  validateProperty<T extends object>(
    object: T,
    propertyPath: string,
    ...groups: string[]
  ): Set<ConstraintViolation<T>> {
    requireBean(object, 'Validated object cannot be null');

    const cursor = PropertyPathCursor.parse(propertyPath);
    const groupChain = this.resolveGroupChain(groups);

    const metaConstraints = this.collectMetaConstraintsForPath(classOf(object), cursor);
    if (metaConstraints.size === 0) {
      return new Set();
    }

    const leafBean = this.resolveLeafBean(object, cursor);
    if (leafBean === undefined) {
      Logger.debug(`Property path "${propertyPath}" is not reachable on this object`);
      return new Set();
    }

    const leafClass = classOf(leafBean);
    const context = ExecutionContext.forBean(object);
    context.withValidatedObject(leafBean, () =>
      this.withTargetPath(context, cursor, () =>
        this.runGroupChain(groupChain, context, () =>
          this.validateMetaConstraints(
            context,
            metaConstraints,
            leafClass,
            metaConstraint => metaConstraint.getValue(leafBean)
          )
        )
      )
    );

    return toViolationSet(context.getFailingConstraints());
  }

  validateValue<T>(
    beanClass: Constructor<T>,
    propertyPath: string,
    value: unknown,
    ...groups: string[]
  ): Set<ConstraintViolation<T>> {
    if (beanClass === null || beanClass === undefined || typeof beanClass !== 'function') {
      throw new ValidationUsageError('Class cannot be null');
    }

    const cursor = PropertyPathCursor.parse(propertyPath);
    const groupChain = this.resolveGroupChain(groups);

    const metaConstraints = this.collectMetaConstraintsForPath(beanClass, cursor);
    if (metaConstraints.size === 0) {
      return new Set();
    }

    const context = ExecutionContext.forClass(beanClass);
    this.withTargetPath(context, cursor, () =>
      this.runGroupChain(groupChain, context, () =>
        this.validateMetaConstraints(context, metaConstraints, beanClass, () => value)
      )
    );

    return toViolationSet(context.getFailingConstraints());
  }

  // ---------------------------------------------------------------------------
  // Group chain
  // ---------------------------------------------------------------------------

  private resolveGroupChain(groups: readonly string[]): GroupChain {
    const requested = groups.length === 0 ? [DEFAULT_GROUP] : groups;
    const groupChain = this.groupChainGenerator.getGroupChainFor(requested);
    Logger.debug(
      `Group chain for [${requested.join(', ')}]: ${groupChain.toArray().map(String).join(' -> ')}`
    );
    return groupChain;
  }

  /**
   * Validate each group of the chain in turn. When a group that belongs to
   * a sequence records a violation, the remaining groups of that sequence
   * run are skipped. Only violations recorded since the run started count.
   */
  private runGroupChain<T>(
    groupChain: GroupChain,
    context: ExecutionContext<T>,
    validateGroup: () => void
  ): void {
    let currentSequence: string | undefined;
    let violationsBeforeSequence = 0;

    while (groupChain.hasNext()) {
      const group = groupChain.next();
      if (group.sequence !== currentSequence) {
        currentSequence = group.sequence;
        violationsBeforeSequence = context.getViolationCount();
      }

      context.setCurrentGroup(group.group, group.sequence);
      validateGroup();

      if (group.sequence !== undefined && context.getViolationCount() > violationsBeforeSequence) {
        this.skipRemainderOfSequence(groupChain, group.sequence);
      }
    }
  }

  private skipRemainderOfSequence(groupChain: GroupChain, sequence: string): void {
    const skipped: string[] = [];
    while (groupChain.hasNext() && groupChain.peek()?.sequence === sequence) {
      skipped.push(groupChain.next().group);
    }
    if (skipped.length > 0) {
      Logger.debug(`Sequence "${sequence}" failed, skipping: ${skipped.join(', ')}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Full graph validation
  // ---------------------------------------------------------------------------

  private validateGroup<T>(context: ExecutionContext<T>): void {
    this.validateConstraints(context);
    this.validateCascadedConstraints(context);
  }

  /**
   * Validates the non-cascaded constraints of the object on top of the stack
   */
  private validateConstraints<T>(context: ExecutionContext<T>): void {
    const bean = context.peekValidatedObject();
    const beanClass = context.peekValidatedObjectType();
    if (bean === undefined || beanClass === undefined) return;

    const beanMetaData = this.metadataProvider.getBeanMetaData(beanClass);
    this.validateMetaConstraints(
      context,
      beanMetaData.metaConstraints,
      beanMetaData.beanClass,
      metaConstraint => metaConstraint.getValue(bean)
    );
    context.markProcessedForCurrentGroup();
  }

  private validateCascadedConstraints<T>(context: ExecutionContext<T>): void {
    const bean = context.peekValidatedObject();
    const beanClass = context.peekValidatedObjectType();
    if (bean === undefined || beanClass === undefined) return;

    const { cascadedMembers } = this.metadataProvider.getBeanMetaData(beanClass);
    for (const member of cascadedMembers) {
      const value = member.getValue(bean);
      if (value === null || value === undefined) continue;

      context.withProperty(member.propertyName, () => {
        const elements = this.createIteratorForCascadedValue(context, member, value);
        this.validateCascadedElements(context, elements);
      });
    }
  }

  /**
   * Elements to validate for a cascaded value: every element of a
   * collection, map or array (with an indexed path segment), or the value
   * itself.
   */
  private createIteratorForCascadedValue<T>(
    context: ExecutionContext<T>,
    member: CascadedMember,
    value: unknown
  ): Iterable<CascadedElement> {
    if (isCollection(member.type)) {
      context.appendIndexToPropertyPath();
      return collectionElements(value, member.propertyName, member.type.kind);
    }
    if (isArray(member.type)) {
      context.appendIndexToPropertyPath();
      return arrayElements(value, member.propertyName);
    }
    return [{ value }];
  }

  private validateCascadedElements<T>(
    context: ExecutionContext<T>,
    elements: Iterable<CascadedElement>
  ): void {
    for (const { value, index } of elements) {
      // Only objects carry metadata
      if (typeof value !== 'object' || value === null) continue;
      if (context.isProcessedForCurrentGroup(value)) continue;

      if (index !== undefined) {
        context.replacePropertyIndex(index);
      }
      context.withValidatedObject(value, () => this.validateGroup(context));
    }
  }

  private validateMetaConstraints<T>(
    context: ExecutionContext<T>,
    metaConstraints: Iterable<MetaConstraint>,
    beanClass: Constructor,
    readValue: (metaConstraint: MetaConstraint) => unknown
  ): void {
    for (const metaConstraint of metaConstraints) {
      context.withProperty(metaConstraint.propertyName, () => {
        if (!context.needsValidation(metaConstraint.groups)) return;
        this.evaluateConstraint(metaConstraint, beanClass, () => readValue(metaConstraint), context);
      });
    }
  }

  private evaluateConstraint<T>(
    metaConstraint: MetaConstraint,
    beanClass: Constructor,
    readValue: () => unknown,
    context: ExecutionContext<T>
  ): void {
    try {
      this.constraintEvaluator.evaluate(metaConstraint, beanClass, readValue(), context);
    } catch (error) {
      if (error instanceof ConstraintEvaluationError) {
        throw error;
      }
      throw new ConstraintEvaluationError(
        metaConstraint.constraint.name,
        context.getPropertyPath(),
        error
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Path-targeted validation
  // ---------------------------------------------------------------------------

  /**
   * Collects the constraints matching `cursor`, relative to `beanClass`,
   * by walking metadata only. A branch that cannot be followed (unknown
   * member, indexing into a non-indexable type) contributes nothing.
   *
   * A path ending in an indexed segment (`lines[2]`) addresses the element
   * itself, so the element class' class-level constraints match.
   */
  private collectMetaConstraintsForPath(
    beanClass: Constructor,
    cursor: PropertyPathCursor,
    metaConstraints: Set<MetaConstraint> = new Set()
  ): Set<MetaConstraint> {
    const beanMetaData = this.metadataProvider.getBeanMetaData(beanClass);

    if (!cursor.hasNext() && !cursor.isIndexed()) {
      for (const metaConstraint of beanMetaData.metaConstraints) {
        if (metaConstraint.propertyName === cursor.getHead()) {
          metaConstraints.add(metaConstraint);
        }
      }
      return metaConstraints;
    }

    for (const member of beanMetaData.cascadedMembers) {
      if (member.propertyName !== cursor.getHead()) continue;

      const type = cursor.isIndexed() ? getIndexedType(member.type) : member.type;
      const nestedClass = type === undefined ? undefined : beanClassOf(type);
      if (nestedClass === undefined) continue;

      if (cursor.hasNext()) {
        this.collectMetaConstraintsForPath(nestedClass, cursor.next(), metaConstraints);
        continue;
      }

      for (const metaConstraint of this.metadataProvider.getBeanMetaData(nestedClass).metaConstraints) {
        if (metaConstraint.propertyName === '') {
          metaConstraints.add(metaConstraint);
        }
      }
    }

    return metaConstraints;
  }

  /**
   * Follows `cursor` through the live object along cascaded members and
   * returns the bean holding the addressed property, or undefined when the
   * walk hits a missing value or index.
   */
  private resolveLeafBean(root: object, cursor: PropertyPathCursor): object | undefined {
    let bean: object = root;
    let step: PropertyPathCursor | undefined = cursor;

    while (step !== undefined) {
      if (!step.hasNext() && !step.isIndexed()) {
        return bean;
      }

      const head = step.getHead();
      const member = this.metadataProvider
        .getBeanMetaData(classOf(bean))
        .cascadedMembers.find(m => m.propertyName === head);
      if (member === undefined) {
        return undefined;
      }

      const index = step.getIndex();
      const value = index === undefined ? member.getValue(bean) : elementAt(member.getValue(bean), index);
      if (typeof value !== 'object' || value === null) {
        return undefined;
      }

      bean = value;
      step = step.hasNext() ? step.next() : undefined;
    }

    return bean;
  }

  /**
   * Pushes the path leading to the targeted property. A non-indexed last
   * segment names the constrained property itself and is pushed per
   * constraint instead.
   */
  private withTargetPath<T, R>(
    context: ExecutionContext<T>,
    cursor: PropertyPathCursor,
    fn: () => R
  ): R {
    const segments = cursor.segments();
    const last = segments[segments.length - 1];
    const prefix = last.index === undefined ? segments.slice(0, -1) : segments;

    for (const segment of prefix) {
      context.pushProperty(segment.name);
      if (segment.index !== undefined) {
        context.appendIndexToPropertyPath();
        context.replacePropertyIndex(segment.index);
      }
    }

    try {
      return fn();
    } finally {
      for (let i = 0; i < prefix.length; i++) {
        context.popProperty();
      }
    }
  }
}
