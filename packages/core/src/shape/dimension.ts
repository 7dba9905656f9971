/**
 * Axis size classification
 *
 * A Dimension is either a build-time constant or a run-time symbol. The anonymous
 * symbol `-` marks an axis whose size is only known through the owning tensor's
 * ShapeTracker (for example the output of a partial slice).
 */

import { Expression } from '../expression';

// =============================================================================
// Dimension Types
// =============================================================================

export interface ConstantDim<N extends number = number> {
  readonly kind: 'constant';
  readonly size: N;
}

export interface DynamicDim<S extends string = string> {
  readonly kind: 'dynamic';
  readonly symbol: S;
}

export type Dimension = ConstantDim | DynamicDim;

export const ANONYMOUS_SYMBOL = '-';

/**
 * Dynamic axis without a named symbol
 */
export type AnonymousDim = DynamicDim<typeof ANONYMOUS_SYMBOL>;

// =============================================================================
// Constructors
// =============================================================================

export const Dim = {
  /**
   * Build-time constant axis
   *
   * @example
   * const hidden = Dim.constant(768); // ConstantDim<768>
   */
  constant<const N extends number>(size: N): ConstantDim<N> {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`Constant dimension must be a non-negative integer, got ${size.toString()}`);
    }
    return Object.freeze({ kind: 'constant', size });
  },

  /**
   * Run-time axis bound by name
   *
   * @example
   * const batch = Dim.dynamic('batch'); // DynamicDim<'batch'>
   */
  dynamic<const S extends string>(symbol: S): DynamicDim<S> {
    if (symbol.length === 0) {
      throw new RangeError('Dynamic dimension symbol must be non-empty');
    }
    return Object.freeze({ kind: 'dynamic', symbol });
  },

  anonymous(): AnonymousDim {
    return ANONYMOUS;
  },
} as const;

const ANONYMOUS: AnonymousDim = Object.freeze({ kind: 'dynamic', symbol: ANONYMOUS_SYMBOL });

// =============================================================================
// Predicates and Conversion
// =============================================================================

export function isConstantDim(dim: Dimension): dim is ConstantDim {
  return dim.kind === 'constant';
}

export function isDynamicDim(dim: Dimension): dim is DynamicDim {
  return dim.kind === 'dynamic';
}

export function isAnonymousDim(dim: Dimension): dim is AnonymousDim {
  return dim.kind === 'dynamic' && dim.symbol === ANONYMOUS_SYMBOL;
}

/**
 * Same classification and the same size or symbol
 */
export function dimsEqual(a: Dimension, b: Dimension): boolean {
  if (a.kind === 'constant') {
    return b.kind === 'constant' && a.size === b.size;
  }
  return b.kind === 'dynamic' && a.symbol === b.symbol;
}

/**
 * Size expression carried by a dimension
 *
 * Anonymous dimensions carry no size of their own and yield undefined.
 */
export function dimToExpression(dim: Dimension): Expression | undefined {
  if (dim.kind === 'constant') {
    return Expression.from(dim.size);
  }
  return dim.symbol === ANONYMOUS_SYMBOL ? undefined : Expression.symbol(dim.symbol);
}

/**
 * Classify a size expression: literals become constants, anything else is dynamic
 */
export function dimFromExpression(size: Expression): Dimension {
  const value = size.tryToNumber();
  return value === undefined ? ANONYMOUS : Dim.constant(value);
}

export function formatDim(dim: Dimension): string {
  return dim.kind === 'constant' ? dim.size.toString() : dim.symbol;
}
