/**
 * View operations over symbolic shapes
 *
 * Builds a graph over an input whose batch and sequence sizes are only known
 * at run time, then resolves it against two different feeds.
 *
 * Run with: npx tsx examples/01-view-operations.ts
 */

import { Dim, Graph, GraphError, copy, resolveGraph } from '@symgraph/core';

function main(): void {
  const graph = new Graph({ name: 'views' });
  const x = graph.newTensor('x', [Dim.dynamic('batch'), Dim.dynamic('seq'), Dim.constant(8)]);

  // ============================================================================
  // 1. Reshape and permute
  // ============================================================================
  const heads = graph.reshape(x, [copy(0), copy(1), 2, 4]);
  const byHead = graph.permute(heads, [0, 2, 1, 3]);
  console.log('heads:', heads.toString());
  console.log('byHead:', byHead.toString());

  // ============================================================================
  // 2. Slices produce anonymous axes tracked by expression
  // ============================================================================
  const tail = graph.slice(x, [null, { from: 1 }]);
  const window = graph.slice(tail, [null, { start: 0, end: 3 }]);
  console.log('tail tracker:', graph.tracker(tail).toString());
  console.log('window tracker:', graph.tracker(window).toString());

  console.log(`\n${graph.toString()}\n`);

  // ============================================================================
  // 3. Resolve against concrete inputs
  // ============================================================================
  for (const shape of [
    [2, 5, 8],
    [1, 16, 8],
  ]) {
    const result = resolveGraph(graph, { inputs: { x: { shape } } });
    console.log(`fed x ${shape.join('x')}:`);
    console.log('  byHead ->', result.view(byHead).shape.join('x'));
    console.log('  tail   ->', result.view(tail).shape.join('x'));
    console.log('  window ->', result.view(window).ranges.map((r) => `[${r.start.toString()}, ${r.end.toString()})`).join(' '));
  }

  // ============================================================================
  // 4. Mismatched feeds
  // ============================================================================
  try {
    resolveGraph(graph, { inputs: { x: { shape: [2, 5, 6] } } });
  } catch (error) {
    if (!(error instanceof GraphError)) {
      throw error;
    }
    console.log(`\n${error.getFormattedMessage()}`);
  }
}

main();
