export { Graph, NodeBuilder, copy, localSymbol, type LeafInfo } from './graph';
export { GraphTensor } from './tensor';
export { arange, causalMask } from './generators';
export {
  ResolvedGraph,
  resolveGraph,
  type FedInput,
  type ResolveOptions,
  type ResolvedNode,
} from './resolve';
export type {
  AttributeValue,
  BinaryKind,
  EqualityObligation,
  FunctionInput,
  FunctionPayload,
  FunctionResult,
  GraphNode,
  LeafKind,
  NodeAttributes,
  NodeId,
  OpKind,
  ReduceKind,
  ScalarKind,
  UnaryKind,
  ViewKind,
} from './node';
