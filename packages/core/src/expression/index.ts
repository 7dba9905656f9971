export {
  Expression,
  bindingEntries,
  lookupSymbol,
  toExpressions,
  type BinaryOperator,
  type BinaryTerm,
  type ExpressionLike,
  type ExpressionTerm,
  type LiteralTerm,
  type SymbolBindings,
  type SymbolTerm,
} from './expression';
