// src/core/groups/group-chain.ts

import type { Group } from './group.js';

/**
 * Ordered groups of one validation request, consumed through a
 * forward-only cursor. Groups of one sequence are contiguous and in
 * declared order.
 */
export class GroupChain {
  private position = 0;

  constructor(private readonly groups: readonly Group[]) {}

  hasNext(): boolean {
    return this.position < this.groups.length;
  }

  next(): Group {
    const group = this.groups[this.position];
    if (group === undefined) {
      throw new Error('Group chain is exhausted');
    }
    this.position++;
    return group;
  }

  /**
   * The group `next()` would return, without advancing
   */
  peek(): Group | undefined {
    return this.groups[this.position];
  }

  get size(): number {
    return this.groups.length;
  }

  toArray(): Group[] {
    return [...this.groups];
  }
}
