// src/core/groups/group-chain-generator.ts

import { GroupDefinitionError, ValidationUsageError } from '../../utils/errors.js';
import { Group } from './group.js';
import { GroupChain } from './group-chain.js';
import { GroupDefinitions } from './group-definitions.js';

export interface GroupDefinitionValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Turns the groups requested by a validation call into a GroupChain.
 * Sequences are expanded in declared order, transitively; every member
 * carries the identifier of the sequence that was requested.
 */
export class GroupChainGenerator {
  constructor(private readonly definitions: GroupDefinitions = GroupDefinitions.defaults()) {}

  getGroupChainFor(requestedGroups: readonly string[]): GroupChain {
    if (requestedGroups.length === 0) {
      throw new ValidationUsageError('At least one group has to be specified');
    }

    const chain: Group[] = [];
    const seen = new Set<string>();
    const add = (group: Group): void => {
      const key = `${group.group}\u0000${group.sequence ?? ''}`;
      if (seen.has(key)) return;
      seen.add(key);
      chain.push(group);
    };

    for (const id of requestedGroups) {
      if (this.definitions.isSequence(id)) {
        for (const member of this.expandSequence(id, [])) {
          add(new Group(member, id));
        }
      } else if (this.definitions.isGroup(id)) {
        add(new Group(id));
      } else {
        throw new GroupDefinitionError(`Unable to resolve group "${id}"`, id);
      }
    }

    return new GroupChain(chain);
  }

  /**
   * Check every declared sequence for cycles and unknown members
   */
  validateDefinitions(): GroupDefinitionValidation {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const name of this.definitions.getAmbiguousNames()) {
      errors.push(`"${name}" is declared both as a group and as a sequence`);
    }

    for (const name of this.definitions.getSequenceNames()) {
      if (this.definitions.getSequence(name).length === 0) {
        warnings.push(`Sequence "${name}" has no members`);
        continue;
      }
      try {
        this.expandSequence(name, []);
      } catch (error) {
        if (!(error instanceof GroupDefinitionError)) throw error;
        if (!errors.includes(error.message)) {
          errors.push(error.message);
        }
      }
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  /**
   * Depth-first expansion; `path` holds the sequences currently being
   * expanded, so meeting one of them again is a cycle.
   */
  private expandSequence(sequence: string, path: readonly string[]): string[] {
    if (path.includes(sequence)) {
      const cycle = [...path.slice(path.indexOf(sequence)), sequence].join(' -> ');
      throw new GroupDefinitionError(`Cyclic group sequence detected: ${cycle}`, sequence);
    }

    const expanded: string[] = [];
    for (const member of this.definitions.getSequence(sequence)) {
      if (this.definitions.isSequence(member)) {
        expanded.push(...this.expandSequence(member, [...path, sequence]));
      } else if (this.definitions.isGroup(member)) {
        expanded.push(member);
      } else {
        throw new GroupDefinitionError(
          `Sequence "${sequence}" references unknown group "${member}"`,
          member
        );
      }
    }
    return expanded;
  }
}
