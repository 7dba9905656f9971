/**
 * Runtime tests for shape utilities
 */

import { describe, expect, it } from 'vitest';
import { InvalidRangeError, ShapeMismatchError } from '../errors';
import { Dim } from './dimension';
import {
  assertSameRank,
  createShape,
  formatShape,
  insertAt,
  invertPermutation,
  normalizeAxis,
  permuteItems,
  removeAt,
  shapesEqual,
  validatePermutationAxes,
} from './runtime';

describe('createShape', () => {
  it('freezes a copy', () => {
    const shape = createShape([Dim.constant(2), Dim.dynamic('seq')]);
    expect(Object.isFrozen(shape)).toBe(true);
    expect(shape).toHaveLength(2);
  });

  it('rejects ranks above the limit', () => {
    const dims = Array.from({ length: 9 }, () => Dim.constant(1));
    expect(() => createShape(dims)).toThrow(ShapeMismatchError);
  });
});

describe('comparison and formatting', () => {
  it('formats shapes', () => {
    expect(formatShape([Dim.dynamic('batch'), Dim.constant(8)])).toBe('[batch, 8]');
    expect(formatShape([])).toBe('[]');
  });

  it('compares shapes axis by axis', () => {
    expect(shapesEqual([Dim.constant(2)], [Dim.constant(2)])).toBe(true);
    expect(shapesEqual([Dim.constant(2)], [Dim.constant(3)])).toBe(false);
    expect(shapesEqual([Dim.constant(2)], [Dim.constant(2), Dim.constant(2)])).toBe(false);
  });

  it('asserts equal ranks', () => {
    expect(() => assertSameRank('add', [Dim.constant(2)], [])).toThrow(
      "Shape mismatch in 'add': rank 1 does not match rank 0",
    );
  });
});

describe('axes', () => {
  it('normalizes negative axes', () => {
    expect(normalizeAxis('sum', -1, 3)).toBe(2);
    expect(normalizeAxis('sum', 0, 3)).toBe(0);
  });

  it('rejects out-of-bounds axes', () => {
    expect(() => normalizeAxis('sum', 3, 3)).toThrow(InvalidRangeError);
    expect(() => normalizeAxis('sum', -4, 3)).toThrow(InvalidRangeError);
  });

  it('validates permutations', () => {
    expect(validatePermutationAxes(3, [2, 0, 1])).toEqual([2, 0, 1]);
    expect(validatePermutationAxes(2, [-1, 0])).toEqual([1, 0]);
    expect(() => validatePermutationAxes(3, [0, 0, 1])).toThrow(InvalidRangeError);
    expect(() => validatePermutationAxes(2, [0])).toThrow(InvalidRangeError);
  });

  it('inverts and applies permutations', () => {
    expect(invertPermutation([2, 0, 1])).toEqual([1, 2, 0]);
    expect(permuteItems(['a', 'b', 'c'], [2, 0, 1])).toEqual(['c', 'a', 'b']);
  });

  it('inserts and removes items', () => {
    expect(insertAt([1, 2], 1, 9)).toEqual([1, 9, 2]);
    expect(removeAt([1, 2, 3], 0)).toEqual([2, 3]);
  });
});
