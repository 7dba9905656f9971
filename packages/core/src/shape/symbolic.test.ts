/**
 * Runtime tests for run-time symbol bindings
 */

import { describe, expect, it } from 'vitest';
import { ExpressionError, UnresolvedDynamicMismatchError, UnresolvedExpressionError } from '../errors';
import { Expression } from '../expression';
import { Dim } from './dimension';
import { SymbolicEnvironment } from './symbolic';

describe('SymbolicEnvironment', () => {
  it('seeds explicit bindings', () => {
    const env = new SymbolicEnvironment({ batch: 2 });
    expect(env.get('batch')).toBe(2);
    expect(env.entries()).toEqual([{ symbol: 'batch', value: 2, source: 'explicit' }]);
  });

  it('accepts a dimension or a symbol name', () => {
    const env = new SymbolicEnvironment();
    env.bind(Dim.dynamic('seq'), 5, 'input');
    expect(env.get('seq')).toBe(5);
    expect(env.isBound(Dim.dynamic('seq'))).toBe(true);
    expect(env.isBound('batch')).toBe(false);
  });

  it('allows rebinding to the same value', () => {
    const env = new SymbolicEnvironment({ seq: 5 });
    expect(() => env.bind('seq', 5)).not.toThrow();
  });

  it('rejects a conflicting rebinding', () => {
    const env = new SymbolicEnvironment({ seq: 5 });
    expect(() => env.bind('seq', 6, 'input')).toThrow(UnresolvedDynamicMismatchError);
    expect(() => env.bind('seq', 6, 'input')).toThrow("Dynamic size mismatch for symbol 'seq': 5 != 6");
  });

  it('rejects negative and fractional sizes', () => {
    const env = new SymbolicEnvironment();
    expect(() => env.bind('seq', -1)).toThrow(ExpressionError);
    expect(() => env.bind('seq', 1.5)).toThrow(ExpressionError);
  });

  it('reports sizes of dimensions', () => {
    const env = new SymbolicEnvironment({ q: 7 });
    expect(env.sizeOf(Dim.constant(3))).toBe(3);
    expect(env.sizeOf(Dim.dynamic('q'))).toBe(7);
    expect(env.sizeOf(Dim.dynamic('k'))).toBeUndefined();
  });

  describe('unify', () => {
    const seq = Expression.symbol('seq');

    it('binds a bare symbol', () => {
      const env = new SymbolicEnvironment();
      env.unify(seq, 5, 'input x axis 0', 'input');
      expect(env.entries()).toEqual([{ symbol: 'seq', value: 5, source: 'input' }]);
    });

    it('checks a resolvable size', () => {
      const env = new SymbolicEnvironment({ seq: 5 });
      expect(() => env.unify(seq.add(1), 6, 'rel', 'function')).not.toThrow();
      expect(() => env.unify(seq.add(1), 7, 'rel', 'function')).toThrow(
        'Dynamic size mismatch for rel: 6 != 7',
      );
    });

    it('refuses to invert compound sizes', () => {
      const env = new SymbolicEnvironment();
      expect(() => env.unify(seq.mul(2), 10, 'rel', 'input')).toThrow(UnresolvedExpressionError);
    });
  });

  it('clones independently', () => {
    const env = new SymbolicEnvironment({ a: 1 });
    const copy = env.clone();
    copy.bind('b', 2);
    expect(env.isBound('b')).toBe(false);
    expect(copy.asMap()).toEqual(new Map([['a', 1], ['b', 2]]));
  });
});
