/**
 * Run-time symbol bindings
 *
 * Dynamic dimensions are opaque at build time. Once the graph runs, every
 * symbol receives a concrete size; the environment records those bindings and
 * rejects a second, conflicting value for the same symbol.
 */

import {
  ExpressionError,
  UnresolvedDynamicMismatchError,
  UnresolvedExpressionError,
} from '../errors';
import { bindingEntries, type Expression, type SymbolBindings } from '../expression';
import type { Dimension, DynamicDim } from './dimension';

/**
 * Where a binding came from
 */
export type BindingSource = 'explicit' | 'input' | 'function' | 'obligation';

export interface DimensionBinding {
  readonly symbol: string;
  readonly value: number;
  readonly source: BindingSource;
}

/**
 * Environment of symbol bindings for one resolution
 */
export class SymbolicEnvironment {
  private readonly bindings = new Map<string, DimensionBinding>();

  constructor(initial?: SymbolBindings) {
    if (initial !== undefined) {
      for (const [symbol, value] of bindingEntries(initial)) {
        this.bind(symbol, value);
      }
    }
  }

  /**
   * Bind a symbol to a concrete size
   *
   * Rebinding to the same value is a no-op; rebinding to a different value is
   * a dynamic mismatch.
   */
  bind(dimension: string | DynamicDim, value: number, source: BindingSource = 'explicit'): void {
    const symbol = typeof dimension === 'string' ? dimension : dimension.symbol;

    if (!Number.isSafeInteger(value) || value < 0) {
      throw new ExpressionError(
        `Cannot bind symbol '${symbol}' to ${value.toString()}: sizes are non-negative integers`,
        'INVALID_BINDING',
        { symbol, value },
      );
    }

    const existing = this.bindings.get(symbol);
    if (existing !== undefined) {
      if (existing.value !== value) {
        throw new UnresolvedDynamicMismatchError(`symbol '${symbol}'`, existing.value, value, {
          boundBy: existing.source,
          reboundBy: source,
        });
      }
      return;
    }

    this.bindings.set(symbol, { symbol, value, source });
  }

  /**
   * Match a size expression against a concrete value
   *
   * A size that is still a bare unbound symbol gets bound to `value`; anything
   * else must already resolve, and must resolve to `value`.
   */
  unify(size: Expression, value: number, relation: string, source: BindingSource): void {
    const pending = size.substitute(this.asMap());
    const known = pending.tryToNumber();

    if (known === undefined) {
      if (pending.term.op === 'symbol') {
        this.bind(pending.term.name, value, source);
        return;
      }
      throw new UnresolvedExpressionError(pending.toString(), pending.symbols());
    }

    if (known !== value) {
      throw new UnresolvedDynamicMismatchError(relation, known, value, {
        expression: size.toString(),
      });
    }
  }

  get(dimension: string | DynamicDim): number | undefined {
    const symbol = typeof dimension === 'string' ? dimension : dimension.symbol;
    return this.bindings.get(symbol)?.value;
  }

  isBound(dimension: string | DynamicDim): boolean {
    return this.get(dimension) !== undefined;
  }

  /**
   * Concrete size of a dimension, if known
   */
  sizeOf(dim: Dimension): number | undefined {
    return dim.kind === 'constant' ? dim.size : this.get(dim);
  }

  entries(): readonly DimensionBinding[] {
    return [...this.bindings.values()];
  }

  asMap(): ReadonlyMap<string, number> {
    return new Map([...this.bindings].map(([symbol, binding]) => [symbol, binding.value]));
  }

  clone(): SymbolicEnvironment {
    const env = new SymbolicEnvironment();
    this.bindings.forEach((binding, symbol) => {
      env.bindings.set(symbol, binding);
    });
    return env;
  }
}
