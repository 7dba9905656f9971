/**
 * Type-level shape system
 *
 * Shapes are readonly tuples of Dimension. When a shape is written as a literal
 * tuple, the view operations below compute the output shape at compile time
 * with the same rules the runtime applies. Shapes whose rank is not known
 * statically fall back to the general `Shape` type.
 */

import type { Add } from 'ts-arithmetic';
import type { ExpressionLike } from '../expression';
import type { AnonymousDim, ConstantDim, Dimension } from './dimension';

// =============================================================================
// Core Shape Types
// =============================================================================

/**
 * Ordered sequence of axis classifications, one per axis
 */
export type Shape = readonly Dimension[];

/**
 * True when the rank of S is not a literal
 */
type IsUnknownRank<S extends readonly unknown[]> = number extends S['length'] ? true : false;

/**
 * True for negative axis literals, which the type operators do not normalize
 */
type IsNegative<N extends number> = N extends number ? (`${N}` extends `-${string}` ? true : false) : never;

/**
 * Keep a computed shape usable where `Shape` is required
 */
type AsShape<T> = T extends Shape ? T : Shape;

/**
 * Number of axes
 *
 * @example
 * type R = Rank<readonly [ConstantDim<2>, DynamicDim<'seq'>]>; // 2
 */
export type Rank<S extends Shape> = S['length'];

// =============================================================================
// Range Specifications
// =============================================================================

/**
 * A symbolic or literal bound value
 */
export type BoundValue = ExpressionLike;

export type Bound =
  | { readonly kind: 'included'; readonly value: BoundValue }
  | { readonly kind: 'excluded'; readonly value: BoundValue }
  | { readonly kind: 'unbounded' };

/**
 * Per-axis slice specification
 *
 * - `null`: the full axis (`..`)
 * - `{ from: X }`: `X..`
 * - `{ to: X }` / `{ to: X, inclusive: true }`: `..X` / `..=X`
 * - `{ start: X, end: Y }` / `{ ..., inclusive: true }`: `X..Y` / `X..=Y`
 * - `{ lower, upper }`: arbitrary bound pair
 */
export type RangeSpec =
  | null
  | { readonly from: BoundValue }
  | { readonly to: BoundValue; readonly inclusive?: boolean }
  | { readonly start: BoundValue; readonly end: BoundValue; readonly inclusive?: boolean }
  | { readonly lower: Bound; readonly upper: Bound };

/**
 * Output dimension of one sliced axis: only the full range keeps its input
 * classification
 */
export type RangeToDim<R, D extends Dimension> = R extends null ? D : AnonymousDim;

/**
 * Shape after slicing; axes without a range spec are kept whole
 *
 * @example
 * type S = readonly [ConstantDim<4>, ConstantDim<10>];
 * type A = SlicedShape<S, readonly [null, { start: 2; end: 5 }]>;
 * // readonly [ConstantDim<4>, AnonymousDim]
 */
export type SlicedShape<S extends Shape, R extends readonly RangeSpec[]> =
  IsUnknownRank<S> extends true ? Shape : AsShape<SlicedShapeHelper<S, R, readonly []>>;

type SlicedShapeHelper<
  S extends Shape,
  R extends readonly RangeSpec[],
  Acc extends Shape,
> = S extends readonly [infer D extends Dimension, ...infer Rest extends Shape]
  ? R extends readonly [infer H, ...infer RTail extends readonly RangeSpec[]]
    ? SlicedShapeHelper<Rest, RTail, readonly [...Acc, RangeToDim<H, D>]>
    : readonly [...Acc, ...S]
  : Acc;

// =============================================================================
// Permute / Reshape / Concat / Expand
// =============================================================================

/**
 * Shape after reordering axes
 *
 * @example
 * type P = PermutedShape<readonly [A, B, C], readonly [2, 0, 1]>; // readonly [C, A, B]
 */
export type PermutedShape<S extends Shape, Axes extends readonly number[]> =
  IsUnknownRank<S> extends true
    ? Shape
    : true extends IsNegative<Axes[number]>
      ? Shape
      : AsShape<{ readonly [K in keyof Axes]: Axes[K] extends keyof S ? S[Axes[K]] : never }>;

/**
 * Reshape target axis: a literal size or a copy of an input axis size
 */
export type ReshapeDim = number | { readonly copy: number };

/**
 * Shape after reshaping
 *
 * @example
 * type R = ReshapedShape<readonly [B, S, ConstantDim<8>], readonly [{ copy: 0 }, { copy: 1 }, 2, 4]>;
 * // readonly [B, S, ConstantDim<2>, ConstantDim<4>]
 */
export type ReshapedShape<S extends Shape, Target extends readonly ReshapeDim[]> = AsShape<{
  readonly [K in keyof Target]: Target[K] extends number
    ? ConstantDim<Target[K]>
    : Target[K] extends { readonly copy: infer I }
      ? I extends keyof S
        ? S[I]
        : never
      : never;
}>;

/**
 * Size of a concatenated axis: the sum of two constants, else dynamic
 */
export type ConcatDim<A, B> =
  A extends ConstantDim<infer X extends number>
    ? B extends ConstantDim<infer Y extends number>
      ? number extends X | Y
        ? ConstantDim
        : ConstantDim<Add<X, Y>>
      : AnonymousDim
    : AnonymousDim;

/**
 * Shape after concatenating two shapes along `Axis`
 *
 * @example
 * type C = ConcatShape<readonly [ConstantDim<4>, ConstantDim<3>], readonly [ConstantDim<4>, ConstantDim<5>], 1>;
 * // readonly [ConstantDim<4>, ConstantDim<8>]
 */
export type ConcatShape<A extends Shape, B extends Shape, Axis extends number> =
  IsUnknownRank<A> extends true
    ? Shape
    : true extends IsNegative<Axis>
      ? Shape
      : AsShape<{
          readonly [K in keyof A]: K extends `${Axis}`
            ? K extends keyof B
              ? ConcatDim<A[K], B[K]>
              : never
            : A[K];
        }>;

/**
 * Shape with `D` inserted at position `Axis`
 */
export type InsertAxis<S extends Shape, Axis extends number, D extends Dimension> =
  IsUnknownRank<S> extends true
    ? Shape
    : true extends IsNegative<Axis>
      ? Shape
      : AsShape<InsertAxisHelper<S, Axis, D, readonly []>>;

type InsertAxisHelper<
  S extends Shape,
  Axis extends number,
  D extends Dimension,
  Acc extends Shape,
> = Acc['length'] extends Axis
  ? readonly [...Acc, D, ...S]
  : S extends readonly [infer H extends Dimension, ...infer Rest extends Shape]
    ? InsertAxisHelper<Rest, Axis, D, readonly [...Acc, H]>
    : readonly [...Acc, D];

/**
 * Shape with the axis at position `Axis` removed
 */
export type RemoveAxis<S extends Shape, Axis extends number> =
  IsUnknownRank<S> extends true
    ? Shape
    : true extends IsNegative<Axis>
      ? Shape
      : AsShape<RemoveAxisHelper<S, Axis, readonly []>>;

type RemoveAxisHelper<
  S extends Shape,
  Axis extends number,
  Acc extends Shape,
> = S extends readonly [infer H extends Dimension, ...infer Rest extends Shape]
  ? Acc['length'] extends Axis
    ? readonly [...Acc, ...Rest]
    : RemoveAxisHelper<Rest, Axis, readonly [...Acc, H]>
  : Acc;

// =============================================================================
// Matrix Multiplication
// =============================================================================

type LastDim<S extends Shape> = S extends readonly [...Dimension[], infer L extends Dimension]
  ? L
  : never;

type AllButLast<S extends Shape> = S extends readonly [...infer Init extends Shape, Dimension]
  ? Init
  : never;

/**
 * `[..., M, K] x [..., K, N] -> [..., M, N]`; batch axes come from the left operand
 */
export type MatmulShape<A extends Shape, B extends Shape> =
  IsUnknownRank<A> extends true
    ? Shape
    : IsUnknownRank<B> extends true
      ? Shape
      : AsShape<readonly [...AllButLast<A>, LastDim<B>]>;
