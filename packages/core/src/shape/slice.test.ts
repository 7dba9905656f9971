/**
 * Runtime tests for the Range-to-Dimension mapper
 */

import { describe, expect, it } from 'vitest';
import { DEFAULT_UNBOUNDED_SENTINEL } from '../config';
import { InvalidRangeError } from '../errors';
import { Expression } from '../expression';
import { Dim } from './dimension';
import { shapesEqual } from './runtime';
import { bounds, mapSlice, rangeToDim, resolveRange, type ResolvedRange } from './slice';

const ten = Expression.from(10);

function numbers([start, end]: ResolvedRange): [number | undefined, number | undefined] {
  return [start.tryToNumber(), end.tryToNumber()];
}

describe('resolveRange', () => {
  it('translates every range form on an axis of 10', () => {
    expect(numbers(resolveRange({ start: 2, end: 5 }, ten))).toEqual([2, 5]);
    expect(numbers(resolveRange({ start: 2, end: 5, inclusive: true }, ten))).toEqual([2, 6]);
    expect(numbers(resolveRange({ from: 3 }, ten))).toEqual([3, 10]);
    expect(numbers(resolveRange({ to: 4 }, ten))).toEqual([0, 4]);
    expect(numbers(resolveRange({ to: 4, inclusive: true }, ten))).toEqual([0, 5]);
    expect(numbers(resolveRange(null, ten))).toEqual([0, 10]);
  });

  it('translates explicit bound pairs', () => {
    const range = resolveRange({ lower: bounds.excluded(2), upper: bounds.included(7) }, ten);
    expect(numbers(range)).toEqual([3, 8]);
    const open = resolveRange({ lower: bounds.unbounded(), upper: bounds.excluded(6) }, ten);
    expect(numbers(open)).toEqual([0, 6]);
  });

  it('uses the sentinel when the axis size is unknown', () => {
    expect(numbers(resolveRange({ from: 1 }, undefined))).toEqual([1, DEFAULT_UNBOUNDED_SENTINEL]);
    expect(numbers(resolveRange(null, undefined, 100))).toEqual([0, 100]);
    expect(DEFAULT_UNBOUNDED_SENTINEL).toBe(2147483647);
  });

  it('keeps symbolic bounds symbolic', () => {
    const seq = Expression.symbol('seq');
    const [start, end] = resolveRange({ start: seq.sub(4), end: seq }, undefined);
    expect(start.toString()).toBe('(seq - 4)');
    expect(end.toString()).toBe('seq');
  });
});

describe('rangeToDim', () => {
  it('keeps the input dimension for a full range', () => {
    const seq = Dim.dynamic('seq');
    expect(rangeToDim(null, seq)).toBe(seq);
    expect(rangeToDim(undefined, Dim.constant(4))).toEqual(Dim.constant(4));
  });

  it('makes every partial range anonymous, even with literal bounds', () => {
    expect(rangeToDim({ from: 0 }, Dim.constant(10))).toBe(Dim.anonymous());
    expect(rangeToDim({ start: 0, end: 10 }, Dim.constant(10))).toBe(Dim.anonymous());
    expect(rangeToDim({ to: 3 }, Dim.dynamic('seq'))).toBe(Dim.anonymous());
  });
});

describe('mapSlice', () => {
  it('maps per-axis specs and takes missing axes whole', () => {
    const shape = [Dim.constant(4), Dim.dynamic('seq'), Dim.constant(8)];
    const mapping = mapSlice(shape, [null, { from: 1 }]);

    expect(mapping.shape).toEqual([Dim.constant(4), Dim.anonymous(), Dim.constant(8)]);
    expect(mapping.ranges.map(([start, end]) => `${start.toString()}..${end.toString()}`)).toEqual([
      '0..4',
      '1..seq',
      '0..8',
    ]);
  });

  it('each axis resolves against its own dimension', () => {
    const shape = ['a', 'b', 'c', 'd', 'e', 'f'].map((symbol) => Dim.dynamic(symbol));
    const mapping = mapSlice(shape, [null, null, null, null, null, null]);

    expect(shapesEqual(mapping.shape, shape)).toBe(true);
    expect(mapping.ranges.map(([, end]) => end.toString())).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });

  it('prefers tracked sizes over dimensions', () => {
    const n = Expression.symbol('n');
    const mapping = mapSlice([Dim.anonymous()], [{ from: 2 }], [n.sub(1)]);
    expect(mapping.ranges[0]?.[1].toString()).toBe('(n - 1)');
  });

  it('falls back to the sentinel for anonymous axes without a tracked size', () => {
    const mapping = mapSlice([Dim.anonymous()], [{ from: 2 }], undefined, 50);
    expect(mapping.ranges[0]?.[1].toNumber()).toBe(50);
  });

  it('rejects more specs than axes', () => {
    expect(() => mapSlice([Dim.constant(4)], [null, null])).toThrow(InvalidRangeError);
  });
});
