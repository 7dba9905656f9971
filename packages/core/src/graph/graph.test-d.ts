/**
 * Type tests for the shapes produced by Graph operations
 */

import { expectTypeOf } from 'expect-type';
import { Dim, type AnonymousDim, type ConstantDim, type DynamicDim, type Shape } from '../shape';
import { Graph, copy } from './graph';

type Batch = DynamicDim<'batch'>;
type Seq = DynamicDim<'seq'>;

const graph = new Graph();
const x = graph.newTensor('x', [Dim.dynamic('batch'), Dim.dynamic('seq'), Dim.constant(8)]);

expectTypeOf(x.shape).toEqualTypeOf<readonly [Batch, Seq, ConstantDim<8>]>();

expectTypeOf(graph.reshape(x, [copy(0), copy(1), 2, 4]).shape).toEqualTypeOf<
  readonly [Batch, Seq, ConstantDim<2>, ConstantDim<4>]
>();

expectTypeOf(graph.slice(x, [null, { from: 1 }]).shape).toEqualTypeOf<
  readonly [Batch, AnonymousDim, ConstantDim<8>]
>();

expectTypeOf(graph.permute(x, [0, 2, 1]).shape).toEqualTypeOf<readonly [Batch, ConstantDim<8>, Seq]>();

expectTypeOf(graph.sum(x, 2).shape).toEqualTypeOf<readonly [Batch, Seq]>();

expectTypeOf(graph.neg(x).shape).toEqualTypeOf<readonly [Batch, Seq, ConstantDim<8>]>();

const rotary = graph.newTensor('r', [Dim.constant(4), Dim.constant(3)]);
const other = graph.newTensor('o', [Dim.constant(4), Dim.constant(5)]);
expectTypeOf(graph.concat(rotary, other, 1).shape).toEqualTypeOf<readonly [ConstantDim<4>, ConstantDim<8>]>();

// Negative axes are not normalized at the type level
expectTypeOf(graph.sum(x, -1).shape).toEqualTypeOf<Shape>();
