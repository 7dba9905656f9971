/**
 * Causal self-attention skeleton
 *
 * Position indices and the causal mask depend on the sequence length, so
 * they are Function nodes whose payloads run during resolution.
 *
 * Run with: npx tsx examples/02-causal-attention.ts
 */

import { Dim, Graph, Logger, arange, causalMask, copy, resolveGraph } from '@symgraph/core';

function main(): void {
  Logger.setLevel('info');

  const graph = new Graph({ name: 'attention' });
  const x = graph.newTensor('x', [Dim.dynamic('batch'), Dim.dynamic('seq'), Dim.constant(8)]);

  // Rotate-half: [x1, x2] -> [-x2, x1] along the feature axis
  const x1 = graph.slice(x, [null, null, { to: 4 }]);
  const x2 = graph.slice(x, [null, null, { from: 4 }]);
  const rotated = graph.concat(graph.neg(x2), x1, 2);

  const q = graph.permute(graph.reshape(rotated, [copy(0), copy(1), 2, 4]), [0, 2, 1, 3]);
  const kT = graph.permute(graph.reshape(x, [copy(0), copy(1), 2, 4]), [0, 2, 3, 1]);
  const scores = graph.mulScalar(graph.matmul(q, kT), 0.5);

  const mask = causalMask(graph, x, 1);
  const weights = graph.softmax(graph.add(scores, graph.expandTo(mask, scores.shape)), -1);
  const positions = arange(graph, x, 1);

  Logger.info(`built ${graph.size.toString()} nodes, ${graph.obligations.length.toString()} obligations`);

  const result = resolveGraph(graph, { inputs: { x: { shape: [2, 4, 8] } } });
  console.log('bindings:', Object.fromEntries(result.bindings));
  console.log('weights:', result.view(weights).shape.join('x'));
  console.log('positions:', Array.from(result.view(positions).data ?? []));

  const maskView = result.view(mask);
  const n = maskView.shape[0] ?? 0;
  for (let row = 0; row < n; row++) {
    console.log('  ', Array.from(maskView.data?.subarray(row * n, (row + 1) * n) ?? []).join('\t'));
  }
}

main();
