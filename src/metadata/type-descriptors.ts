// src/metadata/type-descriptors.ts

import type { Constructor, TypeDescriptor } from './types.js';

export function bean(type: Constructor): TypeDescriptor {
  return { kind: 'bean', type };
}

export function arrayOf(element: TypeDescriptor | Constructor): TypeDescriptor {
  return { kind: 'array', element: toDescriptor(element) };
}

export function collectionOf(element: TypeDescriptor | Constructor): TypeDescriptor {
  return { kind: 'collection', element: toDescriptor(element) };
}

export function mapOf(element: TypeDescriptor | Constructor): TypeDescriptor {
  return { kind: 'map', element: toDescriptor(element) };
}

export function scalar(): TypeDescriptor {
  return { kind: 'scalar' };
}

function toDescriptor(value: TypeDescriptor | Constructor): TypeDescriptor {
  return typeof value === 'function' ? bean(value) : value;
}

/**
 * Collections and maps are iterated in their natural order.
 */
export function isCollection(type: TypeDescriptor): boolean {
  return type.kind === 'collection' || type.kind === 'map';
}

export function isArray(type: TypeDescriptor): boolean {
  return type.kind === 'array';
}

/**
 * Element type of an indexable descriptor, or undefined when the type
 * cannot be indexed.
 */
export function getIndexedType(type: TypeDescriptor): TypeDescriptor | undefined {
  switch (type.kind) {
    case 'array':
    case 'collection':
    case 'map':
      return type.element;
    default:
      return undefined;
  }
}

export function beanClassOf(type: TypeDescriptor): Constructor | undefined {
  return type.kind === 'bean' ? type.type : undefined;
}

export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'bean':
      return type.type.name || '<anonymous>';
    case 'array':
      return `${describeType(type.element)}[]`;
    case 'collection':
      return `Iterable<${describeType(type.element)}>`;
    case 'map':
      return `Map<key, ${describeType(type.element)}>`;
    case 'scalar':
      return 'scalar';
  }
}
