/**
 * Append-only computation graph
 *
 * The graph owns every node. Operations validate their operands, derive the
 * output Shape and ShapeTracker, and only then append a frozen node; a failing
 * operation leaves the graph exactly as it was. Node ids are dense, monotonic
 * and never reused.
 */

import { resolveGraphOptions, type GraphOptions, type ResolvedGraphOptions } from '../config';
import { InvalidHandleError, InvalidRangeError, ShapeMismatchError } from '../errors';
import { Expression, type ExpressionLike } from '../expression';
import { Logger, type ChildLogger } from '../logger';
import {
  Dim,
  SCALAR_SHAPE,
  brandShape,
  createShape,
  dimAt,
  dimToExpression,
  formatShape,
  insertAt,
  mapSlice,
  normalizeAxis,
  permuteItems,
  removeAt,
  validatePermutationAxes,
  type ConcatShape,
  type Dimension,
  type InsertAxis,
  type MatmulShape,
  type PermutedShape,
  type RangeSpec,
  type RemoveAxis,
  type ReshapeDim,
  type ReshapedShape,
  type Shape,
  type SlicedShape,
} from '../shape';
import { ShapeTracker } from '../tracker';
import type {
  AttributeValue,
  BinaryKind,
  EqualityObligation,
  FunctionPayload,
  GraphNode,
  NodeId,
  OpKind,
  ReduceKind,
  ScalarKind,
  UnaryKind,
} from './node';
import { GraphTensor } from './tensor';

type PendingObligation = Omit<EqualityObligation, 'node'>;

interface NodeDraft {
  readonly kind: OpKind;
  readonly shape: Shape;
  readonly tracker: ShapeTracker;
  readonly inputs: ReadonlyArray<NodeId | GraphTensor>;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  readonly name: string | undefined;
  readonly payload: FunctionPayload | undefined;
  readonly obligations: readonly PendingObligation[];
}

/**
 * Named leaf of the graph, as enumerated for checkpoint loading
 */
export interface LeafInfo {
  readonly id: NodeId;
  readonly name: string;
  readonly shape: Shape;
}

let nextGraphId = 0;

/**
 * Symbol standing for the size of an axis that carries no size of its own
 *
 * @example
 * localSymbol(3, 0) // "%3.0"
 */
export function localSymbol(id: NodeId, axis: number): string {
  return `%${id.toString()}.${axis.toString()}`;
}

/**
 * Reshape target entry that keeps the size of input axis `axis`
 */
export function copy<const I extends number>(axis: I): { readonly copy: I } {
  return { copy: axis };
}

function lengthAt(lengths: readonly Expression[], axis: number, operation: string): Expression {
  const length = lengths[axis];
  if (length === undefined) {
    throw new InvalidRangeError(
      operation,
      `axis ${axis.toString()} is out of bounds for rank ${lengths.length.toString()}`,
    );
  }
  return length;
}

/**
 * Require two sizes to be equal
 *
 * Two literals must match now. Structurally equal sizes need nothing. Anything
 * else is recorded as an obligation for the resolution pass.
 */
function requireEqual(
  operation: string,
  relation: string,
  left: Expression,
  right: Expression,
  into: PendingObligation[],
): void {
  const l = left.tryToNumber();
  const r = right.tryToNumber();
  if (l !== undefined && r !== undefined) {
    if (l !== r) {
      throw new ShapeMismatchError(operation, `${relation}: ${l.toString()} != ${r.toString()}`);
    }
    return;
  }
  if (!left.equals(right)) {
    into.push({ operation, relation, left, right });
  }
}

// =============================================================================
// Node builder
// =============================================================================

/**
 * Staged node insertion
 *
 * Collects edges, attributes and obligations; nothing reaches the graph until
 * `finish()`, which allocates the id.
 *
 * @example
 * const out = graph
 *   .addOp('neg', x.shape, ShapeTracker.contiguous(graph.lengths(x)))
 *   .input(x)
 *   .finish();
 */
export class NodeBuilder<S extends Shape> {
  private readonly sources: Array<NodeId | GraphTensor> = [];
  private readonly attributes: Record<string, AttributeValue> = {};
  private readonly pending: PendingObligation[] = [];
  private label: string | undefined;
  private fn: FunctionPayload | undefined;
  private finished = false;

  constructor(
    private readonly commit: (draft: NodeDraft) => GraphTensor<S>,
    private readonly kind: OpKind,
    private readonly shape: S,
    private readonly tracker: ShapeTracker,
  ) {}

  input(source: NodeId | GraphTensor): this {
    this.sources.push(source);
    return this;
  }

  attribute(key: string, value: AttributeValue): this {
    this.attributes[key] = value;
    return this;
  }

  name(name: string): this {
    this.label = name;
    return this;
  }

  payload(payload: FunctionPayload): this {
    this.fn = payload;
    return this;
  }

  obligation(obligation: PendingObligation): this {
    this.pending.push(obligation);
    return this;
  }

  finish(): GraphTensor<S> {
    if (this.finished) {
      throw new InvalidHandleError('finish', `node builder for '${this.kind}' was already finished`);
    }
    const tensor = this.commit({
      kind: this.kind,
      shape: this.shape,
      tracker: this.tracker,
      inputs: this.sources,
      attributes: { ...this.attributes },
      name: this.label,
      payload: this.fn,
      obligations: this.pending,
    });
    this.finished = true;
    return tensor;
  }
}

// =============================================================================
// Graph
// =============================================================================

/**
 * Append-only arena of operation nodes
 *
 * @example
 * const graph = new Graph({ name: 'attention' });
 * const x = graph.newTensor('x', [Dim.dynamic('batch'), Dim.dynamic('seq'), Dim.constant(8)]);
 * const heads = graph.reshape(x, [copy(0), copy(1), 2, 4]);
 * // heads.shape: [batch, seq, 2, 4]
 */
export class Graph {
  readonly id: number;
  readonly options: ResolvedGraphOptions;
  private readonly arena: GraphNode[] = [];
  private readonly recorded: EqualityObligation[] = [];
  private readonly logger: ChildLogger;

  constructor(options: GraphOptions = {}) {
    this.id = nextGraphId++;
    this.options = resolveGraphOptions(options);
    this.logger = Logger.child(`[${this.options.name}]`, this.options.logLevel);
  }

  // ===========================================================================
  // Inspection
  // ===========================================================================

  /**
   * Nodes in insertion order
   */
  get nodes(): readonly GraphNode[] {
    return [...this.arena];
  }

  get size(): number {
    return this.arena.length;
  }

  /**
   * Size relations recorded while building, checked at resolution
   */
  get obligations(): readonly EqualityObligation[] {
    return [...this.recorded];
  }

  node(id: NodeId): GraphNode {
    const node = this.arena[id];
    if (node === undefined) {
      throw new InvalidHandleError('node', `no node with id ${id.toString()}`);
    }
    return node;
  }

  tracker(tensor: GraphTensor): ShapeTracker {
    return this.check('tracker', tensor).tracker;
  }

  /**
   * Length expression of every axis of a tensor's view
   */
  lengths(tensor: GraphTensor): Expression[] {
    return this.tracker(tensor).lengths();
  }

  /**
   * Named input leaves with their declared shapes
   */
  leaves(): LeafInfo[] {
    return this.arena
      .filter((node) => node.kind === 'input')
      .map((node) => ({ id: node.id, name: node.name ?? '', shape: node.shape }));
  }

  toString(): string {
    const lines = this.arena.map((node) => {
      const inputs = node.inputs.length > 0 ? `(${node.inputs.map((id) => `%${id.toString()}`).join(', ')})` : '';
      const name = node.name === undefined ? '' : ` "${node.name}"`;
      return `  %${node.id.toString()} = ${node.kind}${inputs}${name} ${formatShape(node.shape)}`;
    });
    return [`Graph "${this.options.name}" (${this.arena.length.toString()} nodes)`, ...lines].join('\n');
  }

  // ===========================================================================
  // Insertion
  // ===========================================================================

  /**
   * Start a node; it is inserted by `finish()`
   */
  addOp<S extends Shape>(kind: OpKind, shape: S, tracker: ShapeTracker): NodeBuilder<S> {
    if (tracker.rank !== shape.length) {
      throw new ShapeMismatchError(
        kind,
        `tracker rank ${tracker.rank.toString()} does not match shape ${formatShape(shape)}`,
      );
    }
    return new NodeBuilder<S>((draft) => this.insert<S>(draft, shape), kind, shape, tracker);
  }

  private insert<S extends Shape>(draft: NodeDraft, shape: S): GraphTensor<S> {
    const inputs = draft.inputs.map((source) =>
      typeof source === 'number' ? this.node(source).id : this.check(draft.kind, source).id,
    );

    const id = this.arena.length;
    const node: GraphNode = Object.freeze({
      id,
      kind: draft.kind,
      inputs: Object.freeze(inputs),
      shape: brandShape<S>(shape),
      tracker: draft.tracker,
      attributes: Object.freeze({ ...draft.attributes }),
      ...(draft.name === undefined ? {} : { name: draft.name }),
      ...(draft.payload === undefined ? {} : { payload: draft.payload }),
    });
    this.arena.push(node);
    this.logger.debug(`%${id.toString()} = ${draft.kind} ${formatShape(shape)}`);
    this.record(id, draft.obligations);

    return new GraphTensor(id, brandShape<S>(shape), this.id);
  }

  private record(node: NodeId, obligations: readonly PendingObligation[]): void {
    for (const obligation of obligations) {
      this.recorded.push(Object.freeze({ node, ...obligation }));
      this.logger.debug(
        `obligation on %${node.toString()}: ${obligation.left.toString()} == ${obligation.right.toString()} (${obligation.operation}, ${obligation.relation})`,
      );
    }
  }

  private check(operation: string, tensor: GraphTensor): GraphNode {
    if (tensor.graphId !== this.id) {
      throw new InvalidHandleError(
        operation,
        `tensor %${tensor.id.toString()} belongs to graph #${tensor.graphId.toString()}, not #${this.id.toString()}`,
      );
    }
    const node = this.arena[tensor.id];
    if (node === undefined) {
      throw new InvalidHandleError(operation, `no node with id ${tensor.id.toString()}`);
    }
    return node;
  }

  // ===========================================================================
  // Leaves
  // ===========================================================================

  /**
   * Named input leaf
   *
   * Anonymous axes get a node-local size symbol bound when the input is fed.
   */
  newTensor<const S extends Shape>(name: string, shape: S): GraphTensor<S> {
    const dims = createShape(shape);
    const id = this.arena.length;
    const sizes = dims.map((dim, axis) => dimToExpression(dim) ?? Expression.symbol(localSymbol(id, axis)));
    return this.addOp('input', dims, ShapeTracker.contiguous(sizes)).name(name).finish();
  }

  /**
   * Rank-0 constant
   */
  constant(value: number): GraphTensor<readonly []> {
    return this.addOp('constant', SCALAR_SHAPE, ShapeTracker.contiguous([]))
      .attribute('value', value)
      .finish();
  }

  /**
   * Host-computed node whose data and run-time sizes come from `payload`
   *
   * `sizes` declares the size expression of each axis; by default each axis
   * uses its Dimension, and anonymous axes get a node-local symbol bound from
   * the payload's result.
   */
  addFunction<const S extends Shape>(
    name: string,
    inputs: readonly GraphTensor[],
    shape: S,
    payload: FunctionPayload,
    sizes?: readonly ExpressionLike[],
  ): GraphTensor<S> {
    for (const input of inputs) {
      this.check('addFunction', input);
    }
    const dims = createShape(shape);
    if (sizes !== undefined && sizes.length !== dims.length) {
      throw new ShapeMismatchError(
        'addFunction',
        `${sizes.length.toString()} sizes declared for shape ${formatShape(dims)}`,
      );
    }

    const id = this.arena.length;
    const pending: PendingObligation[] = [];
    const declared = dims.map((dim, axis) => {
      const own = dimToExpression(dim);
      const size = sizes?.[axis];
      if (size === undefined) {
        return own ?? Expression.symbol(localSymbol(id, axis));
      }
      const expression = Expression.from(size);
      if (own !== undefined) {
        requireEqual('addFunction', `axis ${axis.toString()}`, own, expression, pending);
      }
      return expression;
    });

    const builder = this.addOp('function', dims, ShapeTracker.contiguous(declared)).name(name).payload(payload);
    inputs.forEach((input) => builder.input(input));
    pending.forEach((obligation) => builder.obligation(obligation));
    return builder.finish();
  }

  /**
   * Relabel a handle's Shape without inserting a node
   *
   * Constant sizes must agree now; other pairs are recorded as obligations on
   * the tensor's node.
   */
  realize<S extends Shape, const T extends Shape>(tensor: GraphTensor<S>, shape: T): GraphTensor<T> {
    const node = this.check('realize', tensor);
    if (shape.length !== tensor.rank) {
      throw new ShapeMismatchError(
        'realize',
        `cannot realize ${formatShape(tensor.shape)} as ${formatShape(shape)}: rank differs`,
      );
    }

    const lengths = node.tracker.lengths();
    const pending: PendingObligation[] = [];
    shape.forEach((dim, axis) => {
      const size = dimToExpression(dim);
      if (size !== undefined) {
        requireEqual('realize', `axis ${axis.toString()}`, lengthAt(lengths, axis, 'realize'), size, pending);
      }
    });

    const realized = createShape(shape);
    this.record(node.id, pending);
    this.logger.debug(`realize %${node.id.toString()} as ${formatShape(realized)}`);
    return new GraphTensor(node.id, realized, this.id);
  }

  // ===========================================================================
  // View operations
  // ===========================================================================

  /**
   * Slice every axis by a range specification
   *
   * Full ranges (`null`) keep their Dimension; all other ranges produce an
   * anonymous axis whose size lives in the tracker.
   *
   * @example
   * graph.slice(x, [null, { start: 2, end: 5 }]); // [4, -] with range [2, 5)
   */
  slice<S extends Shape, const R extends readonly RangeSpec[]>(
    tensor: GraphTensor<S>,
    ranges: R,
  ): GraphTensor<SlicedShape<S, R>> {
    const node = this.check('slice', tensor);
    const mapping = mapSlice(tensor.shape, ranges, node.tracker.lengths());
    const tracker = node.tracker.slice(mapping.ranges);
    return this.addOp('slice', brandShape<SlicedShape<S, R>>(mapping.shape), tracker)
      .input(tensor)
      .attribute(
        'ranges',
        mapping.ranges.map(([start, end]) => `[${start.toString()}, ${end.toString()})`),
      )
      .finish();
  }

  /**
   * Reorder axes; output axis i is input axis `axes[i]`
   */
  permute<S extends Shape, const A extends readonly number[]>(
    tensor: GraphTensor<S>,
    axes: A,
  ): GraphTensor<PermutedShape<S, A>> {
    const node = this.check('permute', tensor);
    const normalized = validatePermutationAxes(tensor.rank, axes);
    return this.addOp(
      'permute',
      brandShape<PermutedShape<S, A>>(permuteItems(tensor.shape, normalized)),
      node.tracker.permute(normalized),
    )
      .input(tensor)
      .attribute('axes', normalized)
      .finish();
  }

  /**
   * Reshape to literal sizes and copies of input axes
   *
   * A non-contiguous input is made contiguous first. Element counts that are
   * both literal must match; otherwise their equality becomes an obligation.
   *
   * @example
   * graph.reshape(x, [copy(0), copy(1), 2, 4]); // [batch, seq, 8] -> [batch, seq, 2, 4]
   */
  reshape<S extends Shape, const T extends readonly ReshapeDim[]>(
    tensor: GraphTensor<S>,
    target: T,
  ): GraphTensor<ReshapedShape<S, T>> {
    const node = this.check('reshape', tensor);
    const lengths = node.tracker.lengths();
    const dims: Dimension[] = [];
    const sizes: Expression[] = [];

    target.forEach((entry: ReshapeDim, position) => {
      if (typeof entry === 'number') {
        if (!Number.isSafeInteger(entry) || entry <= 0) {
          throw new InvalidRangeError(
            'reshape',
            `target size ${entry.toString()} at position ${position.toString()} must be a positive integer`,
          );
        }
        dims.push(Dim.constant(entry));
        sizes.push(Expression.from(entry));
        return;
      }
      const source = entry.copy;
      if (!Number.isInteger(source) || source < 0 || source >= tensor.rank) {
        throw new InvalidRangeError(
          'reshape',
          `copy(${source.toString()}) at position ${position.toString()} names no axis of ${formatShape(tensor.shape)}`,
        );
      }
      dims.push(dimAt(tensor.shape, source));
      sizes.push(lengthAt(lengths, source, 'reshape'));
    });

    const pending: PendingObligation[] = [];
    const count = (items: readonly Expression[]): Expression =>
      items.reduce((acc, size) => acc.mul(size), Expression.ONE);
    requireEqual('reshape', 'element count', count(lengths), count(sizes), pending);

    const source = node.tracker.isContiguous() ? tensor : this.contiguous(tensor);
    const builder = this.addOp('reshape', brandShape<ReshapedShape<S, T>>(dims), ShapeTracker.contiguous(sizes))
      .input(source)
      .attribute(
        'target',
        target.map((entry: ReshapeDim) => (typeof entry === 'number' ? entry.toString() : `copy(${entry.copy.toString()})`)),
      );
    pending.forEach((obligation) => builder.obligation(obligation));
    return builder.finish();
  }

  /**
   * Insert a broadcast axis of the given Dimension at `axis`
   */
  expand<S extends Shape, const A extends number, D extends Dimension>(
    tensor: GraphTensor<S>,
    axis: A,
    dim: D,
  ): GraphTensor<InsertAxis<S, A, D>> {
    const node = this.check('expand', tensor);
    const position = normalizeAxis('expand', axis, tensor.rank + 1);
    const size = dimToExpression(dim);
    if (size === undefined) {
      throw new InvalidRangeError('expand', 'an anonymous axis has no size to broadcast to');
    }
    return this.addOp(
      'expand',
      brandShape<InsertAxis<S, A, D>>(insertAt(tensor.shape, position, dim)),
      node.tracker.expand(position, size),
    )
      .input(tensor)
      .attribute('axis', position)
      .finish();
  }

  /**
   * Broadcast to a target Shape, aligning trailing axes
   *
   * Leading target axes become broadcast axes; aligned length-1 axes are
   * repeated; other aligned axes must match.
   */
  expandTo<S extends Shape, const T extends Shape>(tensor: GraphTensor<S>, target: T): GraphTensor<T> {
    const node = this.check('expandTo', tensor);
    const offset = target.length - tensor.rank;
    if (offset < 0) {
      throw new ShapeMismatchError(
        'expandTo',
        `cannot expand ${formatShape(tensor.shape)} to lower rank ${formatShape(target)}`,
      );
    }

    const lengths = node.tracker.lengths();
    const pending: PendingObligation[] = [];
    let tracker = node.tracker;

    lengths.forEach((length, axis) => {
      const size = dimToExpression(dimAt(target, offset + axis));
      if (size === undefined) {
        return;
      }
      if (length.equals(1) && !size.equals(1)) {
        tracker = tracker.broadcastAxis(axis, size);
      } else {
        requireEqual('expandTo', `axis ${(offset + axis).toString()}`, length, size, pending);
      }
    });

    for (let axis = offset - 1; axis >= 0; axis--) {
      const size = dimToExpression(dimAt(target, axis));
      if (size === undefined) {
        throw new InvalidRangeError('expandTo', `new axis ${axis.toString()} is anonymous and has no size`);
      }
      tracker = tracker.expand(0, size);
    }

    const builder = this.addOp('expand', createShape(target), tracker)
      .input(tensor)
      .attribute('target', formatShape(target));
    pending.forEach((obligation) => builder.obligation(obligation));
    return builder.finish();
  }

  /**
   * Join two tensors along `axis`
   *
   * @example
   * graph.concat(a, b, 1); // [4, 3] ++ [4, 5] -> [4, 8]
   */
  concat<A extends Shape, B extends Shape, const Axis extends number>(
    a: GraphTensor<A>,
    b: GraphTensor<B>,
    axis: Axis,
  ): GraphTensor<ConcatShape<A, B, Axis>> {
    this.check('concat', a);
    this.check('concat', b);
    if (a.rank !== b.rank) {
      throw new ShapeMismatchError(
        'concat',
        `rank ${a.rank.toString()} does not match rank ${b.rank.toString()}`,
        { left: formatShape(a.shape), right: formatShape(b.shape) },
      );
    }

    const k = normalizeAxis('concat', axis, a.rank);
    const left = this.lengths(a);
    const right = this.lengths(b);
    const pending: PendingObligation[] = [];
    left.forEach((length, i) => {
      if (i !== k) {
        requireEqual('concat', `axis ${i.toString()}`, length, lengthAt(right, i, 'concat'), pending);
      }
    });

    const da = dimAt(a.shape, k);
    const db = dimAt(b.shape, k);
    const joined: Dimension =
      da.kind === 'constant' && db.kind === 'constant' ? Dim.constant(da.size + db.size) : Dim.anonymous();
    const sizes = left.map((length, i) => (i === k ? length.add(lengthAt(right, k, 'concat')) : length));

    const builder = this.addOp(
      'concat',
      brandShape<ConcatShape<A, B, Axis>>(a.shape.map((dim, i) => (i === k ? joined : dim))),
      ShapeTracker.contiguous(sizes),
    )
      .input(a)
      .input(b)
      .attribute('axis', k);
    pending.forEach((obligation) => builder.obligation(obligation));
    return builder.finish();
  }

  /**
   * Materialize a view into fresh contiguous storage
   */
  contiguous<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('contiguous', tensor);
  }

  // ===========================================================================
  // Elementwise and reductions
  // ===========================================================================

  private elementwise<S extends Shape>(kind: UnaryKind | 'contiguous', tensor: GraphTensor<S>): GraphTensor<S> {
    const node = this.check(kind, tensor);
    return this.addOp(kind, tensor.shape, ShapeTracker.contiguous(node.tracker.lengths()))
      .input(tensor)
      .finish();
  }

  neg<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('neg', tensor);
  }

  exp<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('exp', tensor);
  }

  log<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('log', tensor);
  }

  sin<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('sin', tensor);
  }

  cos<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('cos', tensor);
  }

  sqrt<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('sqrt', tensor);
  }

  recip<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('recip', tensor);
  }

  sigmoid<S extends Shape>(tensor: GraphTensor<S>): GraphTensor<S> {
    return this.elementwise('sigmoid', tensor);
  }

  private binary<S extends Shape>(kind: BinaryKind, a: GraphTensor<S>, b: GraphTensor): GraphTensor<S> {
    this.check(kind, a);
    this.check(kind, b);
    if (a.rank !== b.rank) {
      throw new ShapeMismatchError(
        kind,
        `rank ${a.rank.toString()} does not match rank ${b.rank.toString()}`,
        { left: formatShape(a.shape), right: formatShape(b.shape) },
      );
    }

    const left = this.lengths(a);
    const right = this.lengths(b);
    const pending: PendingObligation[] = [];
    left.forEach((length, i) => {
      requireEqual(kind, `axis ${i.toString()}`, length, lengthAt(right, i, kind), pending);
    });

    const builder = this.addOp(kind, a.shape, ShapeTracker.contiguous(left)).input(a).input(b);
    pending.forEach((obligation) => builder.obligation(obligation));
    return builder.finish();
  }

  add<S extends Shape>(a: GraphTensor<S>, b: GraphTensor): GraphTensor<S> {
    return this.binary('add', a, b);
  }

  sub<S extends Shape>(a: GraphTensor<S>, b: GraphTensor): GraphTensor<S> {
    return this.binary('sub', a, b);
  }

  mul<S extends Shape>(a: GraphTensor<S>, b: GraphTensor): GraphTensor<S> {
    return this.binary('mul', a, b);
  }

  div<S extends Shape>(a: GraphTensor<S>, b: GraphTensor): GraphTensor<S> {
    return this.binary('div', a, b);
  }

  maximum<S extends Shape>(a: GraphTensor<S>, b: GraphTensor): GraphTensor<S> {
    return this.binary('maximum', a, b);
  }

  private scalar<S extends Shape>(kind: ScalarKind, tensor: GraphTensor<S>, value: number): GraphTensor<S> {
    const node = this.check(kind, tensor);
    return this.addOp(kind, tensor.shape, ShapeTracker.contiguous(node.tracker.lengths()))
      .input(tensor)
      .attribute('value', value)
      .finish();
  }

  addScalar<S extends Shape>(tensor: GraphTensor<S>, value: number): GraphTensor<S> {
    return this.scalar('add_scalar', tensor, value);
  }

  mulScalar<S extends Shape>(tensor: GraphTensor<S>, value: number): GraphTensor<S> {
    return this.scalar('mul_scalar', tensor, value);
  }

  private reduce<S extends Shape, A extends number>(
    kind: ReduceKind,
    tensor: GraphTensor<S>,
    axis: A,
  ): GraphTensor<RemoveAxis<S, A>> {
    const node = this.check(kind, tensor);
    const k = normalizeAxis(kind, axis, tensor.rank);
    return this.addOp(
      kind,
      brandShape<RemoveAxis<S, A>>(removeAt(tensor.shape, k)),
      ShapeTracker.contiguous(removeAt(node.tracker.lengths(), k)),
    )
      .input(tensor)
      .attribute('axis', k)
      .finish();
  }

  sum<S extends Shape, const A extends number>(tensor: GraphTensor<S>, axis: A): GraphTensor<RemoveAxis<S, A>> {
    return this.reduce('sum', tensor, axis);
  }

  mean<S extends Shape, const A extends number>(tensor: GraphTensor<S>, axis: A): GraphTensor<RemoveAxis<S, A>> {
    return this.reduce('mean', tensor, axis);
  }

  max<S extends Shape, const A extends number>(tensor: GraphTensor<S>, axis: A): GraphTensor<RemoveAxis<S, A>> {
    return this.reduce('max', tensor, axis);
  }

  softmax<S extends Shape>(tensor: GraphTensor<S>, axis: number): GraphTensor<S> {
    const node = this.check('softmax', tensor);
    const k = normalizeAxis('softmax', axis, tensor.rank);
    return this.addOp('softmax', tensor.shape, ShapeTracker.contiguous(node.tracker.lengths()))
      .input(tensor)
      .attribute('axis', k)
      .finish();
  }

  /**
   * `[..., M, K] x [K, N]` or batched `[B..., M, K] x [B..., K, N]`
   */
  matmul<A extends Shape, B extends Shape>(a: GraphTensor<A>, b: GraphTensor<B>): GraphTensor<MatmulShape<A, B>> {
    this.check('matmul', a);
    this.check('matmul', b);
    if (a.rank < 2 || (b.rank !== 2 && b.rank !== a.rank)) {
      throw new ShapeMismatchError(
        'matmul',
        `cannot multiply ${formatShape(a.shape)} by ${formatShape(b.shape)}`,
        { leftRank: a.rank, rightRank: b.rank },
      );
    }

    const left = this.lengths(a);
    const right = this.lengths(b);
    const pending: PendingObligation[] = [];
    requireEqual(
      'matmul',
      'inner dimension',
      lengthAt(left, a.rank - 1, 'matmul'),
      lengthAt(right, b.rank - 2, 'matmul'),
      pending,
    );
    if (b.rank === a.rank) {
      for (let i = 0; i < a.rank - 2; i++) {
        requireEqual('matmul', `batch axis ${i.toString()}`, lengthAt(left, i, 'matmul'), lengthAt(right, i, 'matmul'), pending);
      }
    }

    const shape = [...a.shape.slice(0, -1), dimAt(b.shape, b.rank - 1)];
    const sizes = [...left.slice(0, -1), lengthAt(right, b.rank - 1, 'matmul')];
    const builder = this.addOp('matmul', brandShape<MatmulShape<A, B>>(shape), ShapeTracker.contiguous(sizes))
      .input(a)
      .input(b);
    pending.forEach((obligation) => builder.obligation(obligation));
    return builder.finish();
  }
}
