/**
 * Shape-dependent data generators
 *
 * Position indices and attention masks depend on a sequence length that is
 * only known at run time, so they are Function nodes: the payload reads the
 * realized length of the reference tensor's axis and produces the data.
 */

import { dimAt, normalizeAxis, type Dimension } from '../shape';
import { ShapeTracker } from '../tracker';
import type { Graph } from './graph';
import type { FunctionInput } from './node';
import type { GraphTensor } from './tensor';

function realizedLength(inputs: readonly FunctionInput[], axis: number): number {
  const like = inputs[0];
  const length = like?.shape[axis];
  if (length === undefined) {
    throw new Error(`expected a resolved input with an axis ${axis.toString()}`);
  }
  return length;
}

/**
 * Indices `0, 1, ..., N - 1` where N is the length of `like` along `axis`
 *
 * @example
 * const x = graph.newTensor('x', [Dim.dynamic('seq'), Dim.constant(8)]);
 * const positions = arange(graph, x, 0); // [seq]
 */
export function arange(graph: Graph, like: GraphTensor, axis: number): GraphTensor<readonly [Dimension]> {
  const k = normalizeAxis('arange', axis, like.rank);
  const length = graph.lengths(like)[k];
  const dim = dimAt(like.shape, k);

  return graph.addFunction(
    'ARange',
    [like],
    [dim],
    (inputs, id) => {
      const n = realizedLength(inputs, k);
      return {
        data: Float32Array.from({ length: n }, (_, i) => i),
        view: { id, tracker: ShapeTracker.contiguous([n]) },
      };
    },
    length === undefined ? undefined : [length],
  );
}

/**
 * `N x N` causal attention mask: 0 on and below the diagonal, -Infinity above
 */
export function causalMask(
  graph: Graph,
  like: GraphTensor,
  axis: number,
): GraphTensor<readonly [Dimension, Dimension]> {
  const k = normalizeAxis('causalMask', axis, like.rank);
  const length = graph.lengths(like)[k];
  const dim = dimAt(like.shape, k);

  return graph.addFunction(
    'AttentionMask',
    [like],
    [dim, dim],
    (inputs, id) => {
      const n = realizedLength(inputs, k);
      const data = new Float32Array(n * n);
      for (let row = 0; row < n; row++) {
        for (let col = row + 1; col < n; col++) {
          data[row * n + col] = -Infinity;
        }
      }
      return { data, view: { id, tracker: ShapeTracker.contiguous([n, n]) } };
    },
    length === undefined ? undefined : [length, length],
  );
}
