/**
 * GraphTensor handle
 */

import type { Shape } from '../shape';
import { formatShape } from '../shape';
import type { NodeId } from './node';

/**
 * Non-owning reference to a node's output, scoped to one graph
 *
 * The handle carries its Shape (which `realize` may relabel) and the id of the
 * graph that issued it. It holds no pointer back to the graph; operations take
 * the graph explicitly.
 *
 * @template S - Shape tuple, literal when the rank is known statically
 */
export class GraphTensor<S extends Shape = Shape> {
  constructor(
    readonly id: NodeId,
    readonly shape: S,
    readonly graphId: number,
  ) {
    Object.freeze(this);
  }

  get rank(): number {
    return this.shape.length;
  }

  toString(): string {
    return `GraphTensor(%${this.id.toString()} ${formatShape(this.shape)})`;
  }
}
