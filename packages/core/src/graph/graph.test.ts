/**
 * Runtime tests for graph construction
 */

import { afterEach, describe, expect, it } from 'vitest';
import { InvalidHandleError, InvalidRangeError, ShapeMismatchError } from '../errors';
import { Logger, type LogLevel } from '../logger';
import { Dim, SCALAR_SHAPE, shapesEqual } from '../shape';
import { ShapeTracker } from '../tracker';
import { Graph, copy } from './graph';
import type { GraphTensor } from './tensor';

const batch = Dim.dynamic('batch');
const seq = Dim.dynamic('seq');

function lengths(graph: Graph, tensor: GraphTensor): string[] {
  return graph.lengths(tensor).map(String);
}

describe('Graph', () => {
  describe('leaves', () => {
    it('allocates named inputs with contiguous trackers', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, Dim.constant(8)]);

      expect(x.id).toBe(0);
      expect(graph.size).toBe(1);
      expect(graph.node(x.id)).toMatchObject({ kind: 'input', name: 'x', inputs: [] });
      expect(graph.tracker(x).isContiguous()).toBe(true);
      expect(lengths(graph, x)).toEqual(['batch', '8']);
    });

    it('gives anonymous input axes a node-local size symbol', () => {
      const graph = new Graph();
      graph.newTensor('w', [Dim.constant(2)]);
      const x = graph.newTensor('x', [Dim.anonymous()]);
      expect(lengths(graph, x)).toEqual(['%1.0']);
    });

    it('enumerates named leaves', () => {
      const graph = new Graph();
      const w = graph.newTensor('layer.weight', [Dim.constant(4), Dim.constant(2)]);
      graph.neg(w);

      expect(graph.leaves()).toEqual([{ id: 0, name: 'layer.weight', shape: [Dim.constant(4), Dim.constant(2)] }]);
    });

    it('creates rank-0 constants', () => {
      const graph = new Graph();
      const c = graph.constant(0.5);
      expect(c.shape).toEqual(SCALAR_SHAPE);
      expect(graph.tracker(c).rank).toBe(0);
      expect(graph.node(c.id).attributes).toEqual({ value: 0.5 });
    });

    it('freezes inserted nodes', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(2)]);
      expect(Object.isFrozen(graph.node(x.id))).toBe(true);
    });
  });

  describe('slice', () => {
    it('keeps the shape and view for full ranges', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4), seq]);
      const y = graph.slice(x, [null, null]);

      expect(shapesEqual(y.shape, x.shape)).toBe(true);
      expect(graph.tracker(y).equals(graph.tracker(x))).toBe(true);
    });

    it('makes partially sliced axes anonymous', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4), seq]);
      const y = graph.slice(x, [{ start: 0, end: 4 }, { from: 1 }]);

      expect(y.shape).toEqual([Dim.anonymous(), Dim.anonymous()]);
      expect(lengths(graph, y)).toEqual(['4', '(seq - 1)']);
      expect(graph.node(y.id).attributes).toEqual({ ranges: ['[0, 4)', '[1, seq)'] });
    });

    it('composes nested slices', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(10)]);
      const a = graph.slice(x, [{ start: 2, end: 8 }]);
      const b = graph.slice(a, [{ start: 1, end: 4 }]);

      const [range] = graph.tracker(b).ranges();
      expect(range?.start.toNumber()).toBe(3);
      expect(range?.end.toNumber()).toBe(6);
    });

    it('leaves the graph unchanged on an invalid range', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(10)]);

      expect(() => graph.slice(x, [{ start: 6, end: 3 }])).toThrow(InvalidRangeError);
      expect(() => graph.slice(x, [null, null])).toThrow(InvalidRangeError);
      expect(graph.size).toBe(1);
    });

    it('rejects ranges that start before storage', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(10)]);

      expect(() => graph.slice(x, [{ start: -3, end: 4 }])).toThrow(InvalidRangeError);
      expect(() => graph.slice(x, [{ to: -1 }])).toThrow(InvalidRangeError);
      expect(graph.size).toBe(1);
    });
  });

  describe('permute', () => {
    it('round-trips through the inverse permutation', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq, Dim.constant(8)]);
      const p = graph.permute(x, [2, 0, 1]);
      const q = graph.permute(p, [1, 2, 0]);

      expect(p.shape).toEqual([Dim.constant(8), batch, seq]);
      expect(shapesEqual(q.shape, x.shape)).toBe(true);
      expect(graph.tracker(q).equals(graph.tracker(x))).toBe(true);
    });

    it('rejects invalid permutations without inserting', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq]);
      expect(() => graph.permute(x, [0, 0])).toThrow(InvalidRangeError);
      expect(() => graph.permute(x, [0])).toThrow(InvalidRangeError);
      expect(graph.size).toBe(1);
    });
  });

  describe('concat', () => {
    it('sums constant axes and is undone by slicing', () => {
      const graph = new Graph();
      const a = graph.newTensor('a', [Dim.constant(4), Dim.constant(3)]);
      const b = graph.newTensor('b', [Dim.constant(4), Dim.constant(5)]);
      const c = graph.concat(a, b, 1);

      expect(c.shape).toEqual([Dim.constant(4), Dim.constant(8)]);

      const left = graph.slice(c, [null, { to: 3 }]);
      const right = graph.slice(c, [null, { from: 3 }]);
      expect(lengths(graph, left)).toEqual(['4', '3']);
      expect(lengths(graph, right)).toEqual(['4', '5']);
    });

    it('makes a dynamic concatenated axis anonymous', () => {
      const graph = new Graph();
      const a = graph.newTensor('a', [seq, Dim.constant(2)]);
      const b = graph.newTensor('b', [Dim.constant(1), Dim.constant(2)]);
      const c = graph.concat(a, b, 0);

      expect(c.shape).toEqual([Dim.anonymous(), Dim.constant(2)]);
      expect(lengths(graph, c)).toEqual(['(seq + 1)', '2']);
    });

    it('rejects mismatched constant axes', () => {
      const graph = new Graph();
      const a = graph.newTensor('a', [Dim.constant(4), Dim.constant(3)]);
      const b = graph.newTensor('b', [Dim.constant(5), Dim.constant(3)]);
      expect(() => graph.concat(a, b, 1)).toThrow(ShapeMismatchError);
      expect(() => graph.concat(a, graph.newTensor('c', [Dim.constant(4)]), 0)).toThrow(ShapeMismatchError);
    });
  });

  describe('reshape', () => {
    it('passes dynamic axes through', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq, Dim.constant(8)]);
      const heads = graph.reshape(x, [copy(0), copy(1), 2, 4]);

      expect(heads.shape).toEqual([batch, seq, Dim.constant(2), Dim.constant(4)]);
      expect(graph.obligations).toEqual([]);
      expect(graph.size).toBe(2);
      expect(graph.node(heads.id).attributes).toEqual({ target: ['copy(0)', 'copy(1)', '2', '4'] });
    });

    it('inserts a contiguous node before reshaping a view', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4), Dim.constant(6)]);
      const p = graph.permute(x, [1, 0]);
      const flat = graph.reshape(p, [24]);

      expect(graph.size).toBe(4);
      expect(graph.node(2).kind).toBe('contiguous');
      expect(graph.node(flat.id).inputs).toEqual([2]);
    });

    it('rejects differing constant element counts', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4), Dim.constant(6)]);
      expect(() => graph.reshape(x, [5])).toThrow(ShapeMismatchError);
      expect(graph.size).toBe(1);
    });

    it('rejects partial mappings', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq]);
      expect(() => graph.reshape(x, [copy(3)])).toThrow(InvalidRangeError);
      expect(() => graph.reshape(x, [copy(0), 0])).toThrow(InvalidRangeError);
      expect(graph.size).toBe(1);
    });

    it('records an obligation when element counts cannot be compared', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq]);
      const y = graph.reshape(x, [copy(0), 16]);

      expect(graph.obligations).toHaveLength(1);
      const [obligation] = graph.obligations;
      expect(obligation?.node).toBe(y.id);
      expect(obligation?.relation).toBe('element count');
      expect(obligation?.left.toString()).toBe('(batch * seq)');
      expect(obligation?.right.toString()).toBe('(batch * 16)');
    });
  });

  describe('expand', () => {
    it('inserts a broadcast axis', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4)]);
      const y = graph.expand(x, 0, batch);

      expect(y.shape).toEqual([batch, Dim.constant(4)]);
      expect(lengths(graph, y)).toEqual(['batch', '4']);
      expect(graph.tracker(y).ranges()[0]?.broadcast).toBe(true);
    });

    it('rejects anonymous broadcast axes', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4)]);
      expect(() => graph.expand(x, 0, Dim.anonymous())).toThrow(InvalidRangeError);
    });

    it('broadcasts to a target shape', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(1), Dim.constant(8)]);
      const y = graph.expandTo(x, [batch, Dim.constant(4), Dim.constant(8)]);

      expect(y.shape).toEqual([batch, Dim.constant(4), Dim.constant(8)]);
      expect(lengths(graph, y)).toEqual(['batch', '4', '8']);
    });

    it('rejects incompatible targets', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(3)]);
      expect(() => graph.expandTo(x, [Dim.constant(4)])).toThrow(ShapeMismatchError);
      expect(() => graph.expandTo(x, [])).toThrow(ShapeMismatchError);
    });
  });

  describe('realize', () => {
    it('relabels without inserting and records an obligation', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [seq]);
      const tail = graph.slice(x, [{ from: 1 }]);
      const named = graph.realize(tail, [Dim.dynamic('len')]);

      expect(named.id).toBe(tail.id);
      expect(named.shape).toEqual([Dim.dynamic('len')]);
      expect(graph.size).toBe(2);
      expect(graph.obligations.map((o) => `${o.left.toString()} == ${o.right.toString()}`)).toEqual([
        '(seq - 1) == len',
      ]);
    });

    it('rejects mismatched constants and ranks', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(4)]);
      expect(() => graph.realize(x, [Dim.constant(5)])).toThrow(ShapeMismatchError);
      expect(() => graph.realize(x, [Dim.constant(4), Dim.constant(1)])).toThrow(ShapeMismatchError);
      expect(graph.obligations).toEqual([]);
    });
  });

  describe('elementwise and reductions', () => {
    it('keeps the shape of unary ops', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, Dim.constant(3)]);
      const outputs = [
        graph.neg(x),
        graph.exp(x),
        graph.log(x),
        graph.sin(x),
        graph.cos(x),
        graph.sqrt(x),
        graph.recip(x),
        graph.sigmoid(x),
      ];
      for (const output of outputs) {
        expect(output.shape).toEqual(x.shape);
      }
      expect(graph.size).toBe(9);
    });

    it('requires matching axes for binary ops', () => {
      const graph = new Graph();
      const a = graph.newTensor('a', [Dim.constant(4), seq]);
      const b = graph.newTensor('b', [Dim.constant(4), seq]);

      expect(graph.add(a, b).shape).toEqual(a.shape);
      expect(graph.obligations).toEqual([]);
      expect(() => graph.mul(a, graph.newTensor('c', [Dim.constant(5), seq]))).toThrow(ShapeMismatchError);
      expect(() => graph.sub(a, graph.newTensor('d', [Dim.constant(4)]))).toThrow(ShapeMismatchError);
    });

    it('records an obligation between different symbols', () => {
      const graph = new Graph();
      const a = graph.newTensor('a', [seq]);
      const b = graph.newTensor('b', [Dim.dynamic('len')]);
      graph.maximum(a, b);
      expect(graph.obligations.map((o) => o.relation)).toEqual(['axis 0']);
    });

    it('applies scalars', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(2)]);
      const y = graph.mulScalar(graph.addScalar(x, 1), 0.5);
      expect(graph.node(y.id)).toMatchObject({ kind: 'mul_scalar', attributes: { value: 0.5 } });
    });

    it('removes reduced axes', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq, Dim.constant(8)]);

      expect(graph.sum(x, 1).shape).toEqual([batch, Dim.constant(8)]);
      const pooled = graph.mean(x, -1);
      expect(pooled.shape).toEqual([batch, seq]);
      expect(graph.node(pooled.id).attributes).toEqual({ axis: 2 });
      expect(graph.max(x, 0).shape).toEqual([seq, Dim.constant(8)]);
      expect(graph.softmax(x, -1).shape).toEqual(x.shape);
      expect(() => graph.sum(x, 3)).toThrow(InvalidRangeError);
    });

    it('multiplies matrices', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [batch, seq, Dim.constant(8)]);
      const w = graph.newTensor('w', [Dim.constant(8), Dim.constant(16)]);
      expect(graph.matmul(x, w).shape).toEqual([batch, seq, Dim.constant(16)]);

      const q = graph.newTensor('q', [batch, Dim.constant(4), Dim.constant(8)]);
      const k = graph.newTensor('k', [batch, Dim.constant(8), Dim.constant(2)]);
      expect(graph.matmul(q, k).shape).toEqual([batch, Dim.constant(4), Dim.constant(2)]);
    });

    it('rejects mismatched inner dimensions', () => {
      const graph = new Graph();
      const a = graph.newTensor('a', [Dim.constant(2), Dim.constant(3)]);
      const b = graph.newTensor('b', [Dim.constant(4), Dim.constant(5)]);
      expect(() => graph.matmul(a, b)).toThrow(ShapeMismatchError);
      expect(() => graph.matmul(graph.newTensor('v', [Dim.constant(3)]), b)).toThrow(ShapeMismatchError);
    });
  });

  describe('builder', () => {
    it('inserts nothing until finish', () => {
      const graph = new Graph();
      const x = graph.newTensor('x', [Dim.constant(2)]);
      const builder = graph.addOp('neg', x.shape, ShapeTracker.contiguous([2])).input(x);

      expect(graph.size).toBe(1);
      const y = builder.finish();
      expect(y.id).toBe(1);
      expect(() => builder.finish()).toThrow(InvalidHandleError);
      expect(graph.size).toBe(2);
    });

    it('rejects unknown input ids', () => {
      const graph = new Graph();
      const builder = graph.addOp('neg', [Dim.constant(2)], ShapeTracker.contiguous([2])).input(7);
      expect(() => builder.finish()).toThrow(InvalidHandleError);
      expect(graph.size).toBe(0);
    });

    it('rejects a tracker of the wrong rank', () => {
      const graph = new Graph();
      expect(() => graph.addOp('neg', [Dim.constant(2)], ShapeTracker.contiguous([2, 2]))).toThrow(
        ShapeMismatchError,
      );
    });
  });

  describe('handles', () => {
    it('rejects handles from another graph', () => {
      const first = new Graph();
      const second = new Graph();
      const x = first.newTensor('x', [Dim.constant(2)]);
      second.newTensor('y', [Dim.constant(2)]);

      expect(() => second.neg(x)).toThrow(InvalidHandleError);
      expect(() => second.tracker(x)).toThrow(InvalidHandleError);
      expect(second.size).toBe(1);
    });

    it('rejects unknown node ids', () => {
      expect(() => new Graph().node(0)).toThrow(InvalidHandleError);
    });
  });

  describe('diagnostics', () => {
    afterEach(() => {
      Logger.reset();
    });

    it('renders the node list', () => {
      const graph = new Graph({ name: 'demo' });
      const x = graph.newTensor('x', [Dim.constant(2)]);
      graph.neg(x);

      expect(graph.toString()).toBe('Graph "demo" (2 nodes)\n  %0 = input "x" [2]\n  %1 = neg(%0) [2]');
    });

    it('logs insertions at debug level', () => {
      const messages: string[] = [];
      Logger.configure({
        handler: (level: LogLevel, message: string) => {
          messages.push(`${level}: ${message}`);
        },
      });

      const graph = new Graph({ logLevel: 'debug' });
      graph.newTensor('x', [Dim.constant(4)]);

      expect(messages).toEqual(['debug: [graph] %0 = input [4]']);
    });

    it('keeps a graph log level to that graph', () => {
      const messages: string[] = [];
      Logger.configure({
        level: 'warn',
        handler: (level: LogLevel, message: string) => {
          messages.push(`${level}: ${message}`);
        },
      });

      const verbose = new Graph({ name: 'verbose', logLevel: 'debug' });
      const quiet = new Graph({ name: 'quiet' });
      quiet.newTensor('y', [Dim.constant(2)]);
      verbose.newTensor('x', [Dim.constant(4)]);

      expect(Logger.getLevel()).toBe('warn');
      expect(messages).toEqual(['debug: [verbose] %0 = input [4]']);
    });
  });
});
