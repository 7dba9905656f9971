/**
 * Runtime shape utilities
 *
 * Validation and derivation helpers over runtime `Shape` values. The view
 * operations on the graph use these before inserting a node, so every function
 * here throws instead of returning a partial result.
 */

import { InvalidRangeError, ShapeMismatchError } from '../errors';
import { dimsEqual, formatDim, type Dimension } from './dimension';
import type { Shape } from './types';

// =============================================================================
// Configuration and Constants
// =============================================================================

/**
 * Maximum rank (number of dimensions) for tensors
 */
export const MAX_TENSOR_RANK = 8;

/**
 * Shape of a rank-0 tensor
 */
export const SCALAR_SHAPE = Object.freeze([] as const);

// =============================================================================
// Shape Construction
// =============================================================================

/**
 * Tag a runtime shape with the type-level shape computed for it
 *
 * The runtime derivations in this module follow the same rules as the type
 * operators in types.ts; this is the single point where the two meet.
 */
export function brandShape<S extends Shape>(dims: readonly Dimension[]): S {
  return Object.freeze([...dims]) as S;
}

/**
 * Validate and freeze a shape supplied by a caller
 */
export function createShape<const S extends Shape>(dims: S): S {
  if (dims.length > MAX_TENSOR_RANK) {
    throw new ShapeMismatchError(
      'createShape',
      `rank ${dims.length.toString()} exceeds maximum supported rank ${MAX_TENSOR_RANK.toString()}`,
    );
  }
  return brandShape<S>(dims);
}

// =============================================================================
// Comparison and Formatting
// =============================================================================

/**
 * Same rank and structurally equal dimensions on every axis
 */
export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((dim, i) => {
    const other = b[i];
    return other !== undefined && dimsEqual(dim, other);
  });
}

/**
 * Format a shape for display
 *
 * @example
 * formatShape([Dim.dynamic('batch'), Dim.constant(8)]) // "[batch, 8]"
 */
export function formatShape(shape: Shape): string {
  return `[${shape.map(formatDim).join(', ')}]`;
}

export function assertSameRank(operation: string, a: Shape, b: Shape): void {
  if (a.length !== b.length) {
    throw new ShapeMismatchError(
      operation,
      `rank ${a.length.toString()} does not match rank ${b.length.toString()}`,
      { left: formatShape(a), right: formatShape(b) },
    );
  }
}

// =============================================================================
// Axis Handling
// =============================================================================

/**
 * Normalize a possibly negative axis index against a rank
 */
export function normalizeAxis(operation: string, axis: number, rank: number): number {
  const normalized = axis < 0 ? rank + axis : axis;
  if (!Number.isInteger(axis) || normalized < 0 || normalized >= rank) {
    throw new InvalidRangeError(
      operation,
      `axis ${axis.toString()} is out of bounds for rank ${rank.toString()}`,
    );
  }
  return normalized;
}

export function dimAt(shape: Shape, axis: number): Dimension {
  const dim = shape[axis];
  if (dim === undefined) {
    throw new InvalidRangeError(
      'dimAt',
      `axis ${axis.toString()} is out of bounds for rank ${shape.length.toString()}`,
    );
  }
  return dim;
}

/**
 * Validate that `axes` is a bijection over `0..rank`
 *
 * @example
 * validatePermutationAxes(3, [2, 0, 1]) // [2, 0, 1]
 * validatePermutationAxes(2, [-1, 0])   // [1, 0]
 * validatePermutationAxes(3, [0, 0, 1]) // throws InvalidRangeError
 */
export function validatePermutationAxes(rank: number, axes: readonly number[]): number[] {
  if (axes.length !== rank) {
    throw new InvalidRangeError(
      'permute',
      `permutation length ${axes.length.toString()} must match tensor rank ${rank.toString()}`,
    );
  }

  const seen = new Set<number>();
  return axes.map((axis) => {
    const normalized = normalizeAxis('permute', axis, rank);
    if (seen.has(normalized)) {
      throw new InvalidRangeError('permute', `duplicate axis ${axis.toString()} in permutation`);
    }
    seen.add(normalized);
    return normalized;
  });
}

/**
 * Inverse of a validated permutation
 */
export function invertPermutation(axes: readonly number[]): number[] {
  const inverse = new Array<number>(axes.length).fill(0);
  axes.forEach((axis, i) => {
    inverse[axis] = i;
  });
  return inverse;
}

/**
 * Reorder `items` so that output position i holds `items[axes[i]]`
 */
export function permuteItems<T>(items: readonly T[], axes: readonly number[]): T[] {
  return axes.map((axis) => {
    const item = items[axis];
    if (item === undefined) {
      throw new InvalidRangeError('permute', `axis ${axis.toString()} is out of bounds`);
    }
    return item;
  });
}

export function insertAt<T>(items: readonly T[], index: number, item: T): T[] {
  return [...items.slice(0, index), item, ...items.slice(index)];
}

export function removeAt<T>(items: readonly T[], index: number): T[] {
  return [...items.slice(0, index), ...items.slice(index + 1)];
}
