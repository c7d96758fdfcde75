// src/core/groups/group.ts

/**
 * Group applied when a validation call names no groups.
 */
export const DEFAULT_GROUP = 'Default';

/**
 * One entry of a group chain: a group, and the sequence it was expanded
 * from when it came from one.
 */
export class Group {
  constructor(
    readonly group: string,
    readonly sequence?: string
  ) {}

  get partOfSequence(): boolean {
    return this.sequence !== undefined;
  }

  toString(): string {
    return this.sequence === undefined
      ? this.group
      : `${this.group} (sequence: ${this.sequence})`;
  }
}
