/**
 * Graph node records
 */

import type { Expression } from '../expression';
import type { Shape } from '../shape';
import type { ConcreteRange, ShapeTracker } from '../tracker';

export type NodeId = number;

export type LeafKind = 'input' | 'constant' | 'function';
export type ViewKind = 'slice' | 'permute' | 'reshape' | 'expand' | 'concat' | 'contiguous';
export type UnaryKind = 'neg' | 'exp' | 'log' | 'sin' | 'cos' | 'sqrt' | 'recip' | 'sigmoid';
export type BinaryKind = 'add' | 'sub' | 'mul' | 'div' | 'maximum';
export type ScalarKind = 'add_scalar' | 'mul_scalar';
export type ReduceKind = 'sum' | 'mean' | 'max';

export type OpKind =
  | LeafKind
  | ViewKind
  | UnaryKind
  | BinaryKind
  | ScalarKind
  | ReduceKind
  | 'softmax'
  | 'matmul';

export type AttributeValue = string | number | boolean | readonly number[] | readonly string[];

export type NodeAttributes = Readonly<Record<string, AttributeValue>>;

// =============================================================================
// Function payloads
// =============================================================================

/**
 * A resolved input handed to a Function payload
 */
export interface FunctionInput {
  readonly id: NodeId;
  /** Concrete length of each axis */
  readonly shape: readonly number[];
  readonly ranges: readonly ConcreteRange[];
  /** Present for fed leaves and Function outputs */
  readonly data?: Float32Array;
}

export interface FunctionResult {
  readonly data?: Float32Array;
  /** Must name the node being resolved; the tracker gives its run-time sizes */
  readonly view: { readonly id: NodeId; readonly tracker: ShapeTracker };
}

/**
 * Host computation run at resolution time
 *
 * Receives the resolved inputs and the id assigned to its own node.
 */
export type FunctionPayload = (inputs: readonly FunctionInput[], id: NodeId) => FunctionResult;

// =============================================================================
// Nodes
// =============================================================================

export interface GraphNode {
  readonly id: NodeId;
  readonly kind: OpKind;
  readonly inputs: readonly NodeId[];
  readonly shape: Shape;
  readonly tracker: ShapeTracker;
  readonly attributes: NodeAttributes;
  /** Leaf or Function name */
  readonly name?: string;
  readonly payload?: FunctionPayload;
}

/**
 * A size relation that could not be decided while building
 *
 * Recorded by the op that relied on it and checked once symbols are bound.
 */
export interface EqualityObligation {
  readonly node: NodeId;
  readonly operation: string;
  readonly relation: string;
  readonly left: Expression;
  readonly right: Expression;
}
