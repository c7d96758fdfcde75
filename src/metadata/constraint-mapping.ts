// src/metadata/constraint-mapping.ts

import { DEFAULT_GROUP } from '../core/groups/group.js';
import { ValidationUsageError } from '../utils/errors.js';
import type { ConstraintDefinition, Constructor, TypeDescriptor } from './types.js';

export interface ConstraintOptions {
  /** Groups the constraint applies to. Defaults to the Default group. */
  groups?: readonly string[];
}

export interface ConstraintDeclaration {
  readonly propertyName: string;
  readonly constraint: ConstraintDefinition;
  readonly groups: readonly string[];
}

export interface CascadeDeclaration {
  readonly propertyName: string;
  readonly type: TypeDescriptor;
}

export interface TypeDeclarations {
  readonly constraints: readonly ConstraintDeclaration[];
  readonly cascades: readonly CascadeDeclaration[];
}

export interface DeclarationStore {
  constraints: ConstraintDeclaration[];
  cascades: CascadeDeclaration[];
}

/**
 * Declarations for a single class, built fluently:
 *
 * ```typescript
 * mapping.type(Order)
 *   .property('id', notNull())
 *   .property('lines', size({ min: 1 }), { groups: ['Checkout'] })
 *   .cascade('customer', bean(Customer))
 *   .cascade('lines', arrayOf(OrderLine));
 * ```
 */
export class TypeMapping<T> {
  constructor(
    readonly beanClass: Constructor<T>,
    private readonly store: DeclarationStore
  ) {}

  property<K extends keyof T & string>(
    propertyName: K,
    constraint: ConstraintDefinition,
    options: ConstraintOptions = {}
  ): this {
    this.store.constraints.push({
      propertyName,
      constraint,
      groups: this.resolveGroups(options)
    });
    return this;
  }

  /**
   * Class-level constraint: evaluated against the bean itself and reported
   * at the bean's own path.
   */
  constraint(constraint: ConstraintDefinition, options: ConstraintOptions = {}): this {
    this.store.constraints.push({
      propertyName: '',
      constraint,
      groups: this.resolveGroups(options)
    });
    return this;
  }

  cascade<K extends keyof T & string>(propertyName: K, type: TypeDescriptor): this {
    if (this.store.cascades.some(c => c.propertyName === propertyName)) {
      throw new ValidationUsageError(
        `Property "${propertyName}" of ${this.beanClass.name} is already marked for cascading`
      );
    }
    this.store.cascades.push({ propertyName, type });
    return this;
  }

  private resolveGroups(options: ConstraintOptions): readonly string[] {
    const groups = options.groups ?? [DEFAULT_GROUP];
    if (groups.length === 0) {
      throw new ValidationUsageError(
        `A constraint on ${this.beanClass.name} must apply to at least one group`
      );
    }
    return groups;
  }
}

/**
 * Programmatic registry of constraint declarations, keyed by class.
 * Declarations made here are read by BeanMetaDataManager, which merges
 * them along the prototype chain.
 */
export class ConstraintMapping {
  private readonly types = new Map<Constructor, DeclarationStore>();

  /**
   * Declarations for `beanClass`. Calling this again for the same class
   * keeps adding to the same declarations.
   */
  type<T>(beanClass: Constructor<T>): TypeMapping<T> {
    let store = this.types.get(beanClass);
    if (!store) {
      store = { constraints: [], cascades: [] };
      this.types.set(beanClass, store);
    }
    return new TypeMapping<T>(beanClass, store);
  }

  getDeclarations(beanClass: Constructor): TypeDeclarations | undefined {
    const store = this.types.get(beanClass);
    if (!store) {
      return undefined;
    }
    return {
      constraints: [...store.constraints],
      cascades: [...store.cascades]
    };
  }

  getMappedTypes(): Constructor[] {
    return Array.from(this.types.keys());
  }
}
