/**
 * Shape module exports
 *
 * @module shape
 *
 * - Dimension classification (constant or run-time symbol)
 * - Type-level shape operators for the view operations
 * - Runtime shape validation and axis helpers
 * - Range-to-Dimension mapping for slices
 * - Run-time symbol bindings
 *
 * ## System Limits
 * - Maximum tensor rank: 8 dimensions
 * - Unbounded slice ends on axes of unknown size resolve to 2^31 - 1
 */

export type {
  Shape,
  Rank,
  BoundValue,
  Bound,
  RangeSpec,
  RangeToDim,
  SlicedShape,
  PermutedShape,
  ReshapeDim,
  ReshapedShape,
  ConcatDim,
  ConcatShape,
  InsertAxis,
  RemoveAxis,
  MatmulShape,
} from './types';

export {
  ANONYMOUS_SYMBOL,
  Dim,
  dimFromExpression,
  dimToExpression,
  dimsEqual,
  formatDim,
  isAnonymousDim,
  isConstantDim,
  isDynamicDim,
  type AnonymousDim,
  type ConstantDim,
  type Dimension,
  type DynamicDim,
} from './dimension';

export {
  MAX_TENSOR_RANK,
  SCALAR_SHAPE,
  assertSameRank,
  brandShape,
  createShape,
  dimAt,
  formatShape,
  insertAt,
  invertPermutation,
  normalizeAxis,
  permuteItems,
  removeAt,
  shapesEqual,
  validatePermutationAxes,
} from './runtime';

export {
  bounds,
  isFullRange,
  mapSlice,
  rangeToDim,
  resolveEnd,
  resolveRange,
  resolveStart,
  toBounds,
  type ResolvedRange,
  type SliceMapping,
} from './slice';

export {
  SymbolicEnvironment,
  type BindingSource,
  type DimensionBinding,
} from './symbolic';
