// src/metadata/bean-metadata-manager.ts

import { Logger } from '../utils/logger.js';
import { ValidationUsageError } from '../utils/errors.js';
import type { ConstraintMapping } from './constraint-mapping.js';
import { describeType } from './type-descriptors.js';
import {
  isConstructor,
  type BeanMetaData,
  type CascadedMember,
  type Constructor,
  type MetaConstraint,
  type MetadataProvider
} from './types.js';

/**
 * Builds and caches per-class metadata from a ConstraintMapping.
 *
 * Metadata for a class merges the declarations of every class on its
 * prototype chain, superclass first. Entries are built on first use and
 * frozen before they are published to the cache, so a lookup either sees
 * no entry or a complete one. Building is a pure function of the mapping,
 * so building the same entry twice yields equal metadata.
 */
export class BeanMetaDataManager implements MetadataProvider {
  private readonly metadataCache = new Map<Constructor, BeanMetaData>();

  constructor(private readonly mapping: ConstraintMapping) {}

  getBeanMetaData(beanClass: Constructor): BeanMetaData {
    if (beanClass === null || beanClass === undefined) {
      throw new ValidationUsageError('Class cannot be null');
    }

    const cached = this.metadataCache.get(beanClass);
    if (cached) {
      return cached;
    }

    const built = this.buildBeanMetaData(beanClass);
    this.metadataCache.set(beanClass, built);
    return built;
  }

  /**
   * Number of classes with cached metadata
   */
  get size(): number {
    return this.metadataCache.size;
  }

  /**
   * Clears cached metadata (useful for testing)
   */
  clearCache(): void {
    this.metadataCache.clear();
  }

  private buildBeanMetaData(beanClass: Constructor): BeanMetaData {
    const metaConstraints: MetaConstraint[] = [];
    const cascadedMembers: CascadedMember[] = [];

    for (const declaringClass of this.getHierarchy(beanClass)) {
      const declarations = this.mapping.getDeclarations(declaringClass);
      if (!declarations) continue;

      for (const declaration of declarations.constraints) {
        const { propertyName } = declaration;
        metaConstraints.push(Object.freeze({
          propertyName,
          groups: new Set(declaration.groups),
          constraint: declaration.constraint,
          declaringClass,
          getValue: (target: object): unknown =>
            propertyName === '' ? target : Reflect.get(target, propertyName)
        }));
      }

      for (const declaration of declarations.cascades) {
        const { propertyName, type } = declaration;
        // A subclass redeclaring a cascade replaces the inherited one
        const inherited = cascadedMembers.findIndex(m => m.propertyName === propertyName);
        if (inherited !== -1) {
          cascadedMembers.splice(inherited, 1);
        }
        cascadedMembers.push(Object.freeze({
          propertyName,
          type,
          declaringClass,
          getValue: (target: object): unknown => Reflect.get(target, propertyName)
        }));
      }
    }

    Logger.debug(
      `Built metadata for ${beanClass.name || '<anonymous>'}: ` +
      `${metaConstraints.length} constraint(s), cascading into ` +
      (cascadedMembers.length > 0
        ? cascadedMembers.map(m => `${m.propertyName}: ${describeType(m.type)}`).join(', ')
        : 'nothing')
    );

    return Object.freeze({
      beanClass,
      metaConstraints: Object.freeze(metaConstraints),
      cascadedMembers: Object.freeze(cascadedMembers)
    });
  }

  /**
   * Classes from the root of the prototype chain down to `beanClass`
   */
  private getHierarchy(beanClass: Constructor): Constructor[] {
    const hierarchy: Constructor[] = [];
    let current: unknown = beanClass;

    while (isConstructor(current) && current !== Function.prototype) {
      hierarchy.unshift(current);
      current = Object.getPrototypeOf(current);
    }

    return hierarchy;
  }
}
