/**
 * Symbolic integer expressions
 *
 * Every size and range bound in the graph is an Expression: a term over integer
 * literals and named run-time symbols (batch size, sequence length, ...). Literal
 * sub-terms fold eagerly, so an expression built only from literals is always a
 * single literal and `tryToNumber()` succeeds on it.
 */

import { ExpressionError, UnresolvedExpressionError } from '../errors';

// =============================================================================
// Terms
// =============================================================================

export type BinaryOperator = 'add' | 'sub' | 'mul' | 'div' | 'min' | 'max';

export interface LiteralTerm {
  readonly op: 'literal';
  readonly value: number;
}

export interface SymbolTerm {
  readonly op: 'symbol';
  readonly name: string;
}

export interface BinaryTerm {
  readonly op: BinaryOperator;
  readonly left: ExpressionTerm;
  readonly right: ExpressionTerm;
}

export type ExpressionTerm = LiteralTerm | SymbolTerm | BinaryTerm;

/**
 * Anything accepted where an expression is expected
 */
export type ExpressionLike = Expression | number;

/**
 * Concrete values for run-time symbols
 */
export type SymbolBindings = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

const OPERATOR_SYMBOLS: Record<BinaryOperator, string> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  min: 'min',
  max: 'max',
};

function literal(value: number): LiteralTerm {
  return { op: 'literal', value };
}

function isLiteral(term: ExpressionTerm): term is LiteralTerm {
  return term.op === 'literal';
}

function isBinary(term: ExpressionTerm): term is BinaryTerm {
  return term.op !== 'literal' && term.op !== 'symbol';
}

function literalRight(term: ExpressionTerm, op: BinaryOperator): number | undefined {
  if (isBinary(term) && term.op === op && isLiteral(term.right)) {
    return term.right.value;
  }
  return undefined;
}

function termsEqual(a: ExpressionTerm, b: ExpressionTerm): boolean {
  if (a === b) return true;
  if (isLiteral(a)) return isLiteral(b) && a.value === b.value;
  if (a.op === 'symbol') return b.op === 'symbol' && a.name === b.name;
  return isBinary(b) && a.op === b.op && termsEqual(a.left, b.left) && termsEqual(a.right, b.right);
}

// =============================================================================
// Simplification
// =============================================================================

function fold(op: BinaryOperator, a: number, b: number): number {
  switch (op) {
    case 'add':
      return a + b;
    case 'sub':
      return a - b;
    case 'mul':
      return a * b;
    case 'div':
      if (b === 0) {
        throw new ExpressionError(`Division by zero in ${a.toString()} / 0`, 'DIVISION_BY_ZERO');
      }
      return Math.floor(a / b);
    case 'min':
      return Math.min(a, b);
    case 'max':
      return Math.max(a, b);
  }
}

function node(op: BinaryOperator, left: ExpressionTerm, right: ExpressionTerm): BinaryTerm {
  return { op, left, right };
}

function combine(op: BinaryOperator, left: ExpressionTerm, right: ExpressionTerm): ExpressionTerm {
  if (isLiteral(left) && isLiteral(right)) {
    return literal(fold(op, left.value, right.value));
  }

  switch (op) {
    case 'add':
      return simplifyAdd(left, right);
    case 'sub':
      return simplifySub(left, right);
    case 'mul':
      return simplifyMul(left, right);
    case 'div':
      return simplifyDiv(left, right);
    case 'min':
    case 'max':
      return simplifyExtremum(op, left, right);
  }
}

function simplifyAdd(left: ExpressionTerm, right: ExpressionTerm): ExpressionTerm {
  // Literals go on the right of commutative operators
  if (isLiteral(left)) return simplifyAdd(right, left);

  if (isLiteral(right)) {
    if (right.value === 0) return left;
    const inner = literalRight(left, 'add');
    if (inner !== undefined && isBinary(left)) {
      return combine('add', left.left, literal(inner + right.value));
    }
  }
  return node('add', left, right);
}

function simplifySub(left: ExpressionTerm, right: ExpressionTerm): ExpressionTerm {
  if (termsEqual(left, right)) return literal(0);
  if (isLiteral(right)) return combine('add', left, literal(-right.value));

  const leftOffset = literalRight(left, 'add');
  const rightOffset = literalRight(right, 'add');
  if (leftOffset !== undefined && isBinary(left)) {
    if (termsEqual(left.left, right)) return literal(leftOffset);
    if (rightOffset !== undefined && isBinary(right) && termsEqual(left.left, right.left)) {
      return literal(leftOffset - rightOffset);
    }
  }
  if (rightOffset !== undefined && isBinary(right) && termsEqual(left, right.left)) {
    return literal(-rightOffset);
  }
  return node('sub', left, right);
}

function simplifyMul(left: ExpressionTerm, right: ExpressionTerm): ExpressionTerm {
  if (isLiteral(left)) return simplifyMul(right, left);

  if (isLiteral(right)) {
    if (right.value === 0) return literal(0);
    if (right.value === 1) return left;
    const inner = literalRight(left, 'mul');
    if (inner !== undefined && isBinary(left)) {
      return combine('mul', left.left, literal(inner * right.value));
    }
  }
  return node('mul', left, right);
}

function simplifyDiv(left: ExpressionTerm, right: ExpressionTerm): ExpressionTerm {
  if (isLiteral(right)) {
    if (right.value === 0) {
      throw new ExpressionError('Division by zero', 'DIVISION_BY_ZERO', {
        dividend: renderTerm(left),
      });
    }
    if (right.value === 1) return left;
  }
  if (isLiteral(left) && left.value === 0) return left;
  return node('div', left, right);
}

function simplifyExtremum(
  op: 'min' | 'max',
  left: ExpressionTerm,
  right: ExpressionTerm,
): ExpressionTerm {
  if (termsEqual(left, right)) return left;
  if (isLiteral(left)) return simplifyExtremum(op, right, left);

  if (isLiteral(right)) {
    const inner = literalRight(left, op);
    if (inner !== undefined && isBinary(left)) {
      return combine(op, left.left, literal(fold(op, inner, right.value)));
    }
  }
  return node(op, left, right);
}

// =============================================================================
// Rendering and evaluation helpers
// =============================================================================

function renderTerm(term: ExpressionTerm): string {
  switch (term.op) {
    case 'literal':
      return term.value.toString();
    case 'symbol':
      return term.name;
    case 'min':
    case 'max':
      return `${term.op}(${renderTerm(term.left)}, ${renderTerm(term.right)})`;
    case 'add':
      if (isLiteral(term.right) && term.right.value < 0) {
        return `(${renderTerm(term.left)} - ${(-term.right.value).toString()})`;
      }
      return `(${renderTerm(term.left)} + ${renderTerm(term.right)})`;
    default:
      return `(${renderTerm(term.left)} ${OPERATOR_SYMBOLS[term.op]} ${renderTerm(term.right)})`;
  }
}

function collectSymbols(term: ExpressionTerm, into: Set<string>): void {
  if (term.op === 'symbol') {
    into.add(term.name);
  } else if (isBinary(term)) {
    collectSymbols(term.left, into);
    collectSymbols(term.right, into);
  }
}

function isBindingMap(bindings: SymbolBindings): bindings is ReadonlyMap<string, number> {
  return bindings instanceof Map;
}

/**
 * Look up a symbol in either binding representation
 */
export function lookupSymbol(bindings: SymbolBindings, name: string): number | undefined {
  if (isBindingMap(bindings)) {
    return bindings.get(name);
  }
  return Object.hasOwn(bindings, name) ? bindings[name] : undefined;
}

/**
 * Entries of either binding representation
 */
export function bindingEntries(bindings: SymbolBindings): Array<[string, number]> {
  return isBindingMap(bindings) ? [...bindings.entries()] : Object.entries(bindings);
}

function substituteTerm(term: ExpressionTerm, bindings: SymbolBindings): ExpressionTerm {
  if (term.op === 'symbol') {
    const value = lookupSymbol(bindings, term.name);
    return value === undefined ? term : literal(value);
  }
  if (isBinary(term)) {
    return combine(term.op, substituteTerm(term.left, bindings), substituteTerm(term.right, bindings));
  }
  return term;
}

// =============================================================================
// Expression
// =============================================================================

/**
 * Immutable symbolic integer term
 *
 * @example
 * const seq = Expression.symbol('seq');
 * const end = seq.add(2).sub(1);      // (seq + 1)
 * end.tryToNumber();                  // undefined
 * end.evaluate({ seq: 7 });           // 8
 * Expression.from(4).mul(3).toNumber(); // 12
 */
export class Expression {
  static readonly ZERO = new Expression(literal(0));
  static readonly ONE = new Expression(literal(1));

  private constructor(readonly term: ExpressionTerm) {}

  /**
   * Wrap an integer literal; existing expressions are returned unchanged
   */
  static from(value: ExpressionLike): Expression {
    if (value instanceof Expression) {
      return value;
    }
    if (!Number.isSafeInteger(value)) {
      throw new ExpressionError(
        `Expression literals must be safe integers, got ${value.toString()}`,
        'NON_INTEGER',
        { value },
      );
    }
    return new Expression(literal(value));
  }

  /**
   * A named run-time symbol
   */
  static symbol(name: string): Expression {
    if (name.length === 0) {
      throw new ExpressionError('Symbol names must be non-empty', 'INVALID_SYMBOL');
    }
    return new Expression({ op: 'symbol', name });
  }

  private apply(op: BinaryOperator, other: ExpressionLike): Expression {
    return new Expression(combine(op, this.term, Expression.from(other).term));
  }

  add(other: ExpressionLike): Expression {
    return this.apply('add', other);
  }

  sub(other: ExpressionLike): Expression {
    return this.apply('sub', other);
  }

  mul(other: ExpressionLike): Expression {
    return this.apply('mul', other);
  }

  /**
   * Floor division
   */
  div(other: ExpressionLike): Expression {
    return this.apply('div', other);
  }

  min(other: ExpressionLike): Expression {
    return this.apply('min', other);
  }

  max(other: ExpressionLike): Expression {
    return this.apply('max', other);
  }

  isConstant(): boolean {
    return isLiteral(this.term);
  }

  /**
   * The concrete value, or undefined while symbols remain
   */
  tryToNumber(): number | undefined {
    return isLiteral(this.term) ? this.term.value : undefined;
  }

  toNumber(): number {
    const value = this.tryToNumber();
    if (value === undefined) {
      throw new UnresolvedExpressionError(this.toString(), this.symbols());
    }
    return value;
  }

  /**
   * Resolve every symbol against `bindings`
   */
  evaluate(bindings: SymbolBindings): number {
    const resolved = this.substitute(bindings);
    const value = resolved.tryToNumber();
    if (value === undefined) {
      throw new UnresolvedExpressionError(this.toString(), resolved.symbols());
    }
    return value;
  }

  /**
   * Replace the bound symbols and simplify; unbound symbols stay symbolic
   */
  substitute(bindings: SymbolBindings): Expression {
    if (isLiteral(this.term)) {
      return this;
    }
    return new Expression(substituteTerm(this.term, bindings));
  }

  /**
   * Free symbols, sorted by name
   */
  symbols(): string[] {
    const names = new Set<string>();
    collectSymbols(this.term, names);
    return [...names].sort();
  }

  /**
   * Structural equality of the simplified terms
   */
  equals(other: ExpressionLike): boolean {
    return termsEqual(this.term, Expression.from(other).term);
  }

  toString(): string {
    return renderTerm(this.term);
  }
}

/**
 * Convert a list of expression-like values
 */
export function toExpressions(values: readonly ExpressionLike[]): Expression[] {
  return values.map((value) => Expression.from(value));
}
