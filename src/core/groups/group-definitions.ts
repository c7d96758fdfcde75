// src/core/groups/group-definitions.ts

import { DEFAULT_GROUP } from './group.js';

export interface GroupDefinitionsInput {
  groups?: readonly string[];
  sequences?: Readonly<Record<string, readonly string[]>>;
}

/**
 * Lookup from a group identifier to either a plain group or an ordered
 * sequence of group identifiers.
 *
 * The Default group is always known. Declaring a sequence named Default
 * replaces the plain Default group with that composition.
 */
export class GroupDefinitions {
  private readonly groups: ReadonlySet<string>;
  private readonly sequences: ReadonlyMap<string, readonly string[]>;

  constructor(input: GroupDefinitionsInput = {}) {
    this.sequences = new Map(
      Object.entries(input.sequences ?? {}).map(([name, members]) => [name, [...members]])
    );
    this.groups = new Set([DEFAULT_GROUP, ...(input.groups ?? [])]);
  }

  static defaults(): GroupDefinitions {
    return new GroupDefinitions();
  }

  isSequence(id: string): boolean {
    return this.sequences.has(id);
  }

  isGroup(id: string): boolean {
    return !this.isSequence(id) && this.groups.has(id);
  }

  getSequence(id: string): readonly string[] {
    return this.sequences.get(id) ?? [];
  }

  getGroupNames(): string[] {
    return Array.from(this.groups).filter(id => !this.isSequence(id));
  }

  getSequenceNames(): string[] {
    return Array.from(this.sequences.keys());
  }

  /**
   * Identifiers declared both as a plain group and as a sequence.
   * Default is excluded, since redefining it as a sequence is allowed.
   */
  getAmbiguousNames(): string[] {
    return this.getSequenceNames().filter(id => id !== DEFAULT_GROUP && this.groups.has(id));
  }
}
