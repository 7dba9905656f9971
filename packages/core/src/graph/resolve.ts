/**
 * Resolution pass
 *
 * Walks a finalized graph in insertion order the way an execution backend
 * does before running kernels: binds run-time symbols from the fed inputs,
 * runs Function payloads, binds symbols named only by size obligations,
 * resolves every tracker to concrete ranges and finally checks the
 * obligations recorded while building.
 */

import {
  FunctionPayloadError,
  InvalidHandleError,
  ShapeMismatchError,
  UnresolvedDynamicMismatchError,
} from '../errors';
import type { SymbolBindings } from '../expression';
import { Logger, type ChildLogger } from '../logger';
import { SymbolicEnvironment, formatShape } from '../shape';
import type { ConcreteRange } from '../tracker';
import type { Graph } from './graph';
import type {
  EqualityObligation,
  FunctionInput,
  FunctionResult,
  GraphNode,
  NodeId,
  OpKind,
} from './node';
import type { GraphTensor } from './tensor';

/**
 * Concrete input fed to a named leaf
 */
export interface FedInput {
  readonly shape: readonly number[];
  readonly data?: Float32Array;
}

export interface ResolveOptions {
  /** Explicit symbol values, e.g. `{ batch: 2 }` */
  readonly bindings?: SymbolBindings;
  /** Fed leaves by name */
  readonly inputs?: Readonly<Record<string, FedInput>>;
}

export interface ResolvedNode extends FunctionInput {
  readonly kind: OpKind;
  readonly ranges: readonly ConcreteRange[];
  /** Physical axis shown at each logical position */
  readonly order: readonly number[];
}

/**
 * Result of a resolution pass
 */
export class ResolvedGraph {
  constructor(
    readonly bindings: ReadonlyMap<string, number>,
    readonly nodes: readonly ResolvedNode[],
  ) {}

  /**
   * Resolved view of a node or tensor handle
   */
  view(target: NodeId | GraphTensor): ResolvedNode {
    const id = typeof target === 'number' ? target : target.id;
    const node = this.nodes[id];
    if (node === undefined) {
      throw new InvalidHandleError('view', `no resolved node with id ${id.toString()}`);
    }
    return node;
  }
}

function elementCount(shape: readonly number[]): number {
  return shape.reduce((acc, size) => acc * size, 1);
}

function fedInput(inputs: Readonly<Record<string, FedInput>>, name: string): FedInput | undefined {
  return Object.hasOwn(inputs, name) ? inputs[name] : undefined;
}

// =============================================================================
// Per-node steps
// =============================================================================

function bindInput(node: GraphNode, fed: FedInput, env: SymbolicEnvironment): Float32Array | undefined {
  const name = node.name ?? `%${node.id.toString()}`;
  if (fed.shape.length !== node.shape.length) {
    throw new ShapeMismatchError(
      'resolve',
      `input '${name}' of shape ${formatShape(node.shape)} fed with rank ${fed.shape.length.toString()}`,
      { fed: fed.shape.join('x') },
    );
  }

  const lengths = node.tracker.lengths();
  node.shape.forEach((dim, axis) => {
    const value = fed.shape[axis];
    const length = lengths[axis];
    if (value === undefined || length === undefined) {
      return;
    }
    if (dim.kind === 'constant' && dim.size !== value) {
      throw new ShapeMismatchError(
        'resolve',
        `input '${name}' axis ${axis.toString()} is fixed at ${dim.size.toString()}, fed ${value.toString()}`,
      );
    }
    env.unify(length, value, `input '${name}' axis ${axis.toString()}`, 'input');
  });

  if (fed.data !== undefined && fed.data.length !== elementCount(fed.shape)) {
    throw new ShapeMismatchError(
      'resolve',
      `input '${name}' data holds ${fed.data.length.toString()} values for shape ${fed.shape.join('x')}`,
    );
  }
  return fed.data;
}

function invokeFunction(
  node: GraphNode,
  resolved: readonly ResolvedNode[],
  env: SymbolicEnvironment,
  log: ChildLogger,
): Float32Array | undefined {
  const name = node.name ?? 'function';
  const context = { node: node.id };
  const payload = node.payload;
  if (payload === undefined) {
    throw new FunctionPayloadError(name, 'node has no payload', context);
  }

  const args = node.inputs.map((id) => {
    const input = resolved[id];
    if (input === undefined) {
      throw new FunctionPayloadError(name, `input %${id.toString()} is not resolved`, context);
    }
    return input;
  });

  log.debug(`invoking ${name} for %${node.id.toString()}`);
  let result: FunctionResult;
  let sizes: readonly number[];
  try {
    result = payload(args, node.id);
    sizes = result.view.tracker.resolve(env.asMap()).shape;
  } catch (error) {
    throw new FunctionPayloadError(
      name,
      error instanceof Error ? error.message : String(error),
      context,
      error,
    );
  }

  if (result.view.id !== node.id) {
    throw new FunctionPayloadError(
      name,
      `returned a view of %${result.view.id.toString()} instead of %${node.id.toString()}`,
      context,
    );
  }
  if (sizes.length !== node.shape.length) {
    throw new FunctionPayloadError(
      name,
      `returned rank ${sizes.length.toString()}, declared ${formatShape(node.shape)}`,
      context,
    );
  }
  if (result.data !== undefined && result.data.length !== elementCount(sizes)) {
    throw new FunctionPayloadError(
      name,
      `returned ${result.data.length.toString()} values for shape ${sizes.join('x')}`,
      context,
    );
  }

  const declared = node.tracker.lengths();
  sizes.forEach((value, axis) => {
    const length = declared[axis];
    if (length !== undefined) {
      env.unify(length, value, `${name} output axis ${axis.toString()}`, 'function');
    }
  });
  return result.data;
}

function constantData(node: GraphNode): Float32Array | undefined {
  const value = node.attributes['value'];
  return typeof value === 'number' ? Float32Array.of(value) : undefined;
}

/**
 * Bind a bare symbol that an obligation equates with a known size
 *
 * `realize` may name a fresh symbol (`(seq - 1) == len`); once one side is
 * known the other side's symbol takes its value. Anything else is left for
 * `checkObligations`.
 */
function bindObligations(obligations: readonly EqualityObligation[], env: SymbolicEnvironment): void {
  for (const obligation of obligations) {
    const bindings = env.asMap();
    const left = obligation.left.substitute(bindings);
    const right = obligation.right.substitute(bindings);
    const l = left.tryToNumber();
    const r = right.tryToNumber();
    if (l !== undefined && r === undefined && right.term.op === 'symbol') {
      env.bind(right.term.name, l, 'obligation');
    } else if (r !== undefined && l === undefined && left.term.op === 'symbol') {
      env.bind(left.term.name, r, 'obligation');
    }
  }
}

function checkObligations(
  obligations: readonly EqualityObligation[],
  env: SymbolicEnvironment,
  log: ChildLogger,
): void {
  const bindings = env.asMap();
  for (const obligation of obligations) {
    const left = obligation.left.evaluate(bindings);
    const right = obligation.right.evaluate(bindings);
    if (left !== right) {
      const relation = `${obligation.relation} of ${obligation.operation} at %${obligation.node.toString()}`;
      log.warn(`obligation failed: ${relation}: ${obligation.left.toString()} = ${left.toString()}, ${obligation.right.toString()} = ${right.toString()}`);
      throw new UnresolvedDynamicMismatchError(relation, left, right, {
        left: obligation.left.toString(),
        right: obligation.right.toString(),
      });
    }
  }
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Bind every run-time size in `graph` and resolve all views
 *
 * @example
 * const result = resolveGraph(graph, {
 *   inputs: { x: { shape: [2, 5, 8] } },
 * });
 * result.bindings.get('seq'); // 5
 * result.view(heads).shape;   // [2, 5, 2, 4]
 */
export function resolveGraph(graph: Graph, options: ResolveOptions = {}): ResolvedGraph {
  const log = Logger.child(`[${graph.options.name}]`, graph.options.logLevel);
  const env = new SymbolicEnvironment(options.bindings);
  const inputs = options.inputs ?? {};
  const resolved: ResolvedNode[] = [];
  const pending = new Map<NodeId, EqualityObligation[]>();
  for (const obligation of graph.obligations) {
    const list = pending.get(obligation.node) ?? [];
    list.push(obligation);
    pending.set(obligation.node, list);
  }

  for (const node of graph.nodes) {
    let data: Float32Array | undefined;
    if (node.kind === 'input') {
      const fed = fedInput(inputs, node.name ?? '');
      data = fed === undefined ? undefined : bindInput(node, fed, env);
    } else if (node.kind === 'constant') {
      data = constantData(node);
    } else if (node.kind === 'function') {
      data = invokeFunction(node, resolved, env, log);
    }
    bindObligations(pending.get(node.id) ?? [], env);

    const view = node.tracker.resolve(env.asMap());
    resolved.push(
      Object.freeze({
        id: node.id,
        kind: node.kind,
        shape: view.shape,
        ranges: view.ranges,
        order: view.order,
        ...(data === undefined ? {} : { data }),
      }),
    );
  }

  for (const binding of env.entries()) {
    log.debug(`bound ${binding.symbol} = ${binding.value.toString()} (${binding.source})`);
  }

  if (graph.options.checkObligations) {
    checkObligations(graph.obligations, env, log);
  }
  return new ResolvedGraph(env.asMap(), resolved);
}
