/**
 * Error hierarchy for graph construction and resolution
 *
 * Build-time errors (shape, range, handle, expression) are thrown before any
 * node is inserted. Resolution errors surface only once symbols are bound.
 */

export type GraphErrorCategory = 'shape' | 'range' | 'resolution' | 'payload' | 'expression' | 'handle';

/**
 * Base error class with error categories and context
 */
export class GraphError extends Error {
  public readonly code: string;
  public readonly category: GraphErrorCategory;

  constructor(
    message: string,
    code: string,
    category: GraphErrorCategory,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GraphError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name}: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${String(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * Operands disagree in rank or in a statically known size
 */
export class ShapeMismatchError extends GraphError {
  constructor(operation: string, reason: string, context?: Record<string, unknown>) {
    super(`Shape mismatch in '${operation}': ${reason}`, 'SHAPE_MISMATCH', 'shape', context);
    this.name = 'ShapeMismatchError';
  }
}

/**
 * A slice, permutation, reshape mapping or axis index is internally inconsistent
 */
export class InvalidRangeError extends GraphError {
  constructor(operation: string, reason: string, context?: Record<string, unknown>) {
    super(`Invalid range in '${operation}': ${reason}`, 'INVALID_RANGE', 'range', context);
    this.name = 'InvalidRangeError';
  }
}

/**
 * Two sizes expected to be equal differ once their symbols are bound
 */
export class UnresolvedDynamicMismatchError extends GraphError {
  constructor(
    relation: string,
    left: number,
    right: number,
    context?: Record<string, unknown>,
  ) {
    super(
      `Dynamic size mismatch for ${relation}: ${left.toString()} != ${right.toString()}`,
      'DYNAMIC_MISMATCH',
      'resolution',
      context,
    );
    this.name = 'UnresolvedDynamicMismatchError';
  }
}

/**
 * A Function node's host computation failed or broke its contract
 */
export class FunctionPayloadError extends GraphError {
  constructor(
    functionName: string,
    reason: string,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(
      `Function '${functionName}' failed: ${reason}`,
      'FUNCTION_PAYLOAD_FAILED',
      'payload',
      context,
      cause === undefined ? undefined : { cause },
    );
    this.name = 'FunctionPayloadError';
  }
}

/**
 * Malformed expression input (non-integer literal, division by zero)
 */
export class ExpressionError extends GraphError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, 'expression', context);
    this.name = 'ExpressionError';
  }
}

/**
 * An expression still holds symbols where a concrete integer is required
 */
export class UnresolvedExpressionError extends ExpressionError {
  constructor(expression: string, symbols: readonly string[]) {
    super(
      `Expression '${expression}' cannot be resolved: unbound symbol(s) ${symbols.join(', ')}`,
      'UNRESOLVED_EXPRESSION',
      { expression, symbols: symbols.join(', ') },
    );
    this.name = 'UnresolvedExpressionError';
  }
}

/**
 * A tensor handle does not belong to the graph it was used with
 */
export class InvalidHandleError extends GraphError {
  constructor(operation: string, reason: string, context?: Record<string, unknown>) {
    super(`Invalid tensor handle in '${operation}': ${reason}`, 'INVALID_HANDLE', 'handle', context);
    this.name = 'InvalidHandleError';
  }
}
