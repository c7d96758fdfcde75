import { describe, it, expect } from 'vitest';
import { PropertyPathCursor, renderPropertyPath } from '../../core/property-path-cursor.js';
import { ValidationUsageError } from '../../utils/errors.js';

describe('PropertyPathCursor', () => {
  describe('parse', () => {
    it('should walk names and indexes segment by segment', () => {
      const first = PropertyPathCursor.parse('orders[2].lines[id].amount');

      expect(first.getHead()).toBe('orders');
      expect(first.isIndexed()).toBe(true);
      expect(first.getIndex()).toBe('2');
      expect(first.hasNext()).toBe(true);

      const second = first.next();
      expect(second.getHead()).toBe('lines');
      expect(second.getIndex()).toBe('id');

      const third = second.next();
      expect(third.getHead()).toBe('amount');
      expect(third.isIndexed()).toBe(false);
      expect(third.getIndex()).toBeUndefined();
      expect(third.hasNext()).toBe(false);
    });

    it('should leave the original cursor in place when advancing', () => {
      const cursor = PropertyPathCursor.parse('customer.address.street');

      expect(cursor.next().getHead()).toBe('address');
      expect(cursor.next().getHead()).toBe('address');
      expect(cursor.getHead()).toBe('customer');
    });

    it('should keep the original path and expose all segments', () => {
      const cursor = PropertyPathCursor.parse('lines[0].sku').next();

      expect(cursor.getOriginalProperty()).toBe('lines[0].sku');
      expect(cursor.segments()).toEqual([{ name: 'lines', index: '0' }, { name: 'sku' }]);
      expect(cursor.toString()).toBe('lines[0].sku');
    });

    it('should throw when advancing past the last segment', () => {
      const cursor = PropertyPathCursor.parse('id');

      expect(() => cursor.next()).toThrow('Property path "id" has no further segments');
    });

    it('should accept a single indexed segment', () => {
      const cursor = PropertyPathCursor.parse('items[1]');

      expect(cursor.getHead()).toBe('items');
      expect(cursor.getIndex()).toBe('1');
      expect(cursor.hasNext()).toBe(false);
    });
  });

  describe('syntax errors', () => {
    it.each([
      ['', 'Invalid property path: path cannot be empty'],
      ['   ', 'Invalid property path: path cannot be empty'],
      ['.a', 'Invalid property path ".a": empty property name at position 0'],
      ['a..b', 'Invalid property path "a..b": empty property name at position 2'],
      ['a.', 'Invalid property path "a.": trailing "." at position 1'],
      ['a[1', 'Invalid property path "a[1": unclosed "[" at position 1'],
      ['a[]', 'Invalid property path "a[]": empty index at position 1'],
      ['a]b', 'Invalid property path "a]b": unexpected "]" at position 1'],
      ['a[1]b', 'Invalid property path "a[1]b": unexpected "b" at position 4'],
      ['[1]', 'Invalid property path "[1]": empty property name at position 0'],
    ])('should reject %j', (path, message) => {
      expect(() => PropertyPathCursor.parse(path)).toThrow(ValidationUsageError);
      expect(() => PropertyPathCursor.parse(path)).toThrow(message);
    });
  });
});

describe('renderPropertyPath', () => {
  it('should join names with dots and append indexes', () => {
    expect(renderPropertyPath([
      { name: 'orders', index: '2' },
      { name: 'lines', index: 'k1' },
      { name: 'amount' },
    ])).toBe('orders[2].lines[k1].amount');
  });

  it('should skip segments without a name', () => {
    expect(renderPropertyPath([{ name: 'items', index: '1' }, { name: '' }])).toBe('items[1]');
    expect(renderPropertyPath([{ name: '' }])).toBe('');
  });
});
