// src/metadata/types.ts

/**
 * A class reference. Metadata is registered and looked up per constructor.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * A single rule: a predicate plus the message template reported when it fails.
 * `attributes` are the rule's parameters (min, max, regexp, ...) and are
 * available to message interpolation.
 */
export interface ConstraintDefinition {
  readonly name: string;
  readonly messageTemplate: string;
  readonly attributes: Readonly<Record<string, unknown>>;
  isValid(value: unknown): boolean;
}

/**
 * Declared static type of a cascaded member.
 *
 * - `bean`: a single nested object validated with its class' metadata
 * - `array`: positional elements
 * - `collection`: any iterable (Set, generator-backed collections, ...)
 * - `map`: a Map or a plain record; keys render as the path index
 * - `scalar`: an opaque value with no metadata of its own
 */
export type TypeDescriptor =
  | { readonly kind: 'bean'; readonly type: Constructor }
  | { readonly kind: 'array'; readonly element: TypeDescriptor }
  | { readonly kind: 'collection'; readonly element: TypeDescriptor }
  | { readonly kind: 'map'; readonly element: TypeDescriptor }
  | { readonly kind: 'scalar' };

/**
 * A constraint bound to a property (or, with an empty property name, to the
 * bean itself) together with the groups it applies to.
 */
export interface MetaConstraint {
  readonly propertyName: string;
  readonly groups: ReadonlySet<string>;
  readonly constraint: ConstraintDefinition;
  /** Class that declared the constraint; a superclass for inherited ones. */
  readonly declaringClass: Constructor;
  getValue(bean: object): unknown;
}

/**
 * A member whose non-null value is itself walked during validation.
 */
export interface CascadedMember {
  readonly propertyName: string;
  readonly type: TypeDescriptor;
  readonly declaringClass: Constructor;
  getValue(bean: object): unknown;
}

export interface BeanMetaData {
  readonly beanClass: Constructor;
  readonly metaConstraints: readonly MetaConstraint[];
  readonly cascadedMembers: readonly CascadedMember[];
}

/**
 * Source of per-class metadata. Must return the same result for the same
 * class every time, and computing it twice must be harmless.
 */
export interface MetadataProvider {
  getBeanMetaData(beanClass: Constructor): BeanMetaData;
}

export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function';
}

/**
 * Runtime class of an object. Objects without a usable `constructor`
 * (e.g. created with Object.create(null)) resolve to Object.
 */
export function classOf(value: object): Constructor {
  const ctor: unknown = value.constructor;
  return isConstructor(ctor) ? ctor : Object;
}
