/**
 * Range-to-Dimension mapping
 *
 * Translates per-axis slice specifications into canonical half-open
 * `[start, end)` expression pairs and classifies each output axis. Only a full
 * range keeps the input axis's Dimension; every partial range yields an
 * anonymous dynamic axis, even when its bounds are literals, because bounds
 * live in the general expression domain.
 */

import { DEFAULT_UNBOUNDED_SENTINEL } from '../config';
import { InvalidRangeError } from '../errors';
import { Expression } from '../expression';
import { Dim, dimToExpression, type Dimension } from './dimension';
import { formatShape } from './runtime';
import type { Bound, BoundValue, RangeSpec, Shape } from './types';

export type ResolvedRange = readonly [start: Expression, end: Expression];

export interface SliceMapping {
  /** Canonical `[start, end)` per axis, relative to the axis being sliced */
  readonly ranges: readonly ResolvedRange[];
  /** Output classification per axis */
  readonly shape: Shape;
}

// =============================================================================
// Bounds
// =============================================================================

export const bounds = {
  included(value: BoundValue): Bound {
    return { kind: 'included', value };
  },
  excluded(value: BoundValue): Bound {
    return { kind: 'excluded', value };
  },
  unbounded(): Bound {
    return { kind: 'unbounded' };
  },
} as const;

export function isFullRange(spec: RangeSpec | undefined): spec is null | undefined {
  return spec === null || spec === undefined;
}

/**
 * Lower and upper bound of a range specification
 */
export function toBounds(spec: RangeSpec): readonly [lower: Bound, upper: Bound] {
  if (spec === null) {
    return [bounds.unbounded(), bounds.unbounded()];
  }
  if ('lower' in spec) {
    return [spec.lower, spec.upper];
  }
  if ('from' in spec) {
    return [bounds.included(spec.from), bounds.unbounded()];
  }
  const upper = spec.inclusive === true ? bounds.included : bounds.excluded;
  if ('to' in spec) {
    return [bounds.unbounded(), upper(spec.to)];
  }
  return [bounds.included(spec.start), upper(spec.end)];
}

/**
 * included X -> X, excluded X -> X + 1, unbounded -> 0
 */
export function resolveStart(bound: Bound): Expression {
  switch (bound.kind) {
    case 'included':
      return Expression.from(bound.value);
    case 'excluded':
      return Expression.from(bound.value).add(1);
    case 'unbounded':
      return Expression.ZERO;
  }
}

/**
 * excluded X -> X, included X -> X + 1, unbounded -> the axis size, or the
 * sentinel when the size is unknown
 */
export function resolveEnd(
  bound: Bound,
  size: Expression | undefined,
  sentinel: number = DEFAULT_UNBOUNDED_SENTINEL,
): Expression {
  switch (bound.kind) {
    case 'excluded':
      return Expression.from(bound.value);
    case 'included':
      return Expression.from(bound.value).add(1);
    case 'unbounded':
      return size ?? Expression.from(sentinel);
  }
}

/**
 * Canonical `[start, end)` for one axis
 *
 * @example
 * const n = Expression.from(10);
 * resolveRange({ start: 2, end: 5 }, n);                  // [2, 5)
 * resolveRange({ start: 2, end: 5, inclusive: true }, n); // [2, 6)
 * resolveRange({ from: 3 }, n);                           // [3, 10)
 * resolveRange({ to: 4 }, n);                             // [0, 4)
 * resolveRange(null, n);                                  // [0, 10)
 */
export function resolveRange(
  spec: RangeSpec,
  size: Expression | undefined,
  sentinel: number = DEFAULT_UNBOUNDED_SENTINEL,
): ResolvedRange {
  const [lower, upper] = toBounds(spec);
  return [resolveStart(lower), resolveEnd(upper, size, sentinel)];
}

/**
 * Output Dimension of one sliced axis
 */
export function rangeToDim(spec: RangeSpec | undefined, dim: Dimension): Dimension {
  return isFullRange(spec) ? dim : Dim.anonymous();
}

// =============================================================================
// Whole-shape mapping
// =============================================================================

/**
 * Map per-axis range specifications over a shape of any rank
 *
 * Axes beyond the end of `specs` are taken whole. Each axis resolves its
 * unbounded end against its own size: `sizes[i]` when given (the current
 * tracked length), else the axis Dimension.
 */
export function mapSlice(
  shape: Shape,
  specs: readonly RangeSpec[],
  sizes?: readonly Expression[],
  sentinel: number = DEFAULT_UNBOUNDED_SENTINEL,
): SliceMapping {
  if (specs.length > shape.length) {
    throw new InvalidRangeError(
      'slice',
      `${specs.length.toString()} ranges given for shape ${formatShape(shape)} of rank ${shape.length.toString()}`,
    );
  }

  const ranges: ResolvedRange[] = [];
  const dims: Dimension[] = [];
  shape.forEach((dim, axis) => {
    const spec = specs[axis] ?? null;
    const size = sizes?.[axis] ?? dimToExpression(dim);
    ranges.push(resolveRange(spec, size, sentinel));
    dims.push(rangeToDim(spec, dim));
  });

  return { ranges, shape: dims };
}
