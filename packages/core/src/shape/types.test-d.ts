/**
 * Type tests for shape/types.ts
 */

import { expectTypeOf } from 'expect-type';
import type { AnonymousDim, ConstantDim, DynamicDim } from './dimension';
import type {
  ConcatShape,
  InsertAxis,
  MatmulShape,
  PermutedShape,
  Rank,
  RemoveAxis,
  ReshapedShape,
  Shape,
  SlicedShape,
} from './types';

type Batch = DynamicDim<'batch'>;
type Seq = DynamicDim<'seq'>;
type C2 = ConstantDim<2>;
type C3 = ConstantDim<3>;
type C4 = ConstantDim<4>;
type C5 = ConstantDim<5>;

// =============================================================================
// Rank and slicing
// =============================================================================

expectTypeOf<Rank<readonly [Batch, Seq, C4]>>().toEqualTypeOf<3>();

expectTypeOf<SlicedShape<readonly [C4, ConstantDim<10>], readonly [null, { start: 2; end: 5 }]>>().toEqualTypeOf<
  readonly [C4, AnonymousDim]
>();

// Axes without a range are kept whole
expectTypeOf<SlicedShape<readonly [Seq, C4], readonly [{ from: 1 }]>>().toEqualTypeOf<
  readonly [AnonymousDim, C4]
>();

expectTypeOf<SlicedShape<Shape, readonly [null]>>().toEqualTypeOf<Shape>();

// =============================================================================
// Permute / Reshape / Concat
// =============================================================================

expectTypeOf<PermutedShape<readonly [Batch, Seq, C4], readonly [2, 0, 1]>>().toEqualTypeOf<
  readonly [C4, Batch, Seq]
>();

expectTypeOf<PermutedShape<readonly [Batch, Seq], readonly [-1, 0]>>().toEqualTypeOf<Shape>();

expectTypeOf<
  ReshapedShape<readonly [Batch, Seq, ConstantDim<8>], readonly [{ copy: 0 }, { copy: 1 }, 2, 4]>
>().toEqualTypeOf<readonly [Batch, Seq, C2, C4]>();

expectTypeOf<ConcatShape<readonly [C4, C3], readonly [C4, C5], 1>>().toEqualTypeOf<
  readonly [C4, ConstantDim<8>]
>();

expectTypeOf<ConcatShape<readonly [Seq, C4], readonly [Seq, C4], 0>>().toEqualTypeOf<
  readonly [AnonymousDim, C4]
>();

expectTypeOf<ConcatShape<readonly [C4, C3], readonly [C4, C5], -1>>().toEqualTypeOf<Shape>();

// =============================================================================
// Insert / Remove
// =============================================================================

expectTypeOf<InsertAxis<readonly [Batch, C4], 1, Seq>>().toEqualTypeOf<readonly [Batch, Seq, C4]>();
expectTypeOf<InsertAxis<readonly [Batch, C4], 2, Seq>>().toEqualTypeOf<readonly [Batch, C4, Seq]>();
expectTypeOf<InsertAxis<readonly [Batch, C4], -1, Seq>>().toEqualTypeOf<Shape>();

expectTypeOf<RemoveAxis<readonly [Batch, Seq, C4], 1>>().toEqualTypeOf<readonly [Batch, C4]>();
expectTypeOf<RemoveAxis<readonly [Batch, Seq, C4], -1>>().toEqualTypeOf<Shape>();

// =============================================================================
// Matmul
// =============================================================================

expectTypeOf<MatmulShape<readonly [Batch, C2, C3], readonly [C3, C5]>>().toEqualTypeOf<
  readonly [Batch, C2, C5]
>();
expectTypeOf<MatmulShape<Shape, readonly [C3, C5]>>().toEqualTypeOf<Shape>();
