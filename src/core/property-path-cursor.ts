// src/core/property-path-cursor.ts

import { ValidationUsageError } from '../utils/errors.js';

export interface PathSegment {
  readonly name: string;
  /** Raw text between the brackets, when the segment is indexed */
  readonly index?: string;
}

/**
 * Render path segments as `name[index].name`. Segments with an empty name
 * (class-level constraints) contribute nothing.
 */
export function renderPropertyPath(segments: readonly PathSegment[]): string {
  return segments
    .filter(segment => segment.name !== '')
    .map(segment => segment.index === undefined ? segment.name : `${segment.name}[${segment.index}]`)
    .join('.');
}

function parseSegments(path: string): PathSegment[] {
  if (path.trim() === '') {
    throw new ValidationUsageError('Invalid property path: path cannot be empty');
  }

  const invalid = (reason: string, position: number): ValidationUsageError =>
    new ValidationUsageError(`Invalid property path "${path}": ${reason} at position ${position}`);

  const segments: PathSegment[] = [];
  let i = 0;

  while (i < path.length) {
    const start = i;
    while (i < path.length && path[i] !== '.' && path[i] !== '[') {
      if (path[i] === ']') {
        throw invalid('unexpected "]"', i);
      }
      i++;
    }

    const name = path.slice(start, i);
    if (name === '') {
      throw invalid('empty property name', start);
    }

    let index: string | undefined;
    if (path[i] === '[') {
      const close = path.indexOf(']', i);
      if (close === -1) {
        throw invalid('unclosed "["', i);
      }
      index = path.slice(i + 1, close);
      if (index === '') {
        throw invalid('empty index', i);
      }
      i = close + 1;
    }

    segments.push(index === undefined ? { name } : { name, index });

    if (i < path.length) {
      if (path[i] !== '.') {
        throw invalid(`unexpected "${path[i]}"`, i);
      }
      i++;
      if (i === path.length) {
        throw invalid('trailing "."', i - 1);
      }
    }
  }

  return segments;
}

/**
 * A parsed dotted/indexed property path (`orders[2].lines[id].amount`)
 * positioned at one segment. Cursors are immutable: `next()` returns a
 * cursor over the remainder, so one parsed path can be walked along
 * several branches of the metadata graph.
 */
export class PropertyPathCursor {
  private constructor(
    private readonly originalProperty: string,
    private readonly pathSegments: readonly PathSegment[],
    private readonly position: number
  ) {}

  static parse(path: string): PropertyPathCursor {
    return new PropertyPathCursor(path, parseSegments(path), 0);
  }

  getHead(): string {
    return this.current().name;
  }

  isIndexed(): boolean {
    return this.current().index !== undefined;
  }

  getIndex(): string | undefined {
    return this.current().index;
  }

  hasNext(): boolean {
    return this.position < this.pathSegments.length - 1;
  }

  next(): PropertyPathCursor {
    if (!this.hasNext()) {
      throw new ValidationUsageError(`Property path "${this.originalProperty}" has no further segments`);
    }
    return new PropertyPathCursor(this.originalProperty, this.pathSegments, this.position + 1);
  }

  getOriginalProperty(): string {
    return this.originalProperty;
  }

  /**
   * All segments of the path, independent of the cursor position
   */
  segments(): readonly PathSegment[] {
    return this.pathSegments;
  }

  toString(): string {
    return renderPropertyPath(this.pathSegments);
  }

  private current(): PathSegment {
    return this.pathSegments[this.position];
  }
}
