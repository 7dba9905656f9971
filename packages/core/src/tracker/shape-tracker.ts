/**
 * ShapeTracker: the view algebra of a tensor
 *
 * A tracker holds one `[start, end)` range per physical axis of the underlying
 * storage plus the order in which those axes are presented. Slicing narrows
 * ranges, permuting reorders them, expanding adds broadcast axes that visit no
 * storage. Trackers are immutable; every operation returns a new one.
 */

import { InvalidRangeError } from '../errors';
import { Expression, type ExpressionLike, type SymbolBindings } from '../expression';
import {
  insertAt,
  invertPermutation,
  normalizeAxis,
  permuteItems,
  validatePermutationAxes,
  type ResolvedRange,
} from '../shape';

// =============================================================================
// Types
// =============================================================================

/**
 * One physical axis
 */
export interface AxisRange {
  readonly start: Expression;
  readonly end: Expression;
  /** Full size of the axis in storage */
  readonly size: Expression;
  /** Broadcast axes repeat a single element and visit no storage */
  readonly broadcast: boolean;
}

/**
 * Concrete ranges of a tracker once every symbol is bound
 */
export interface ConcreteRange {
  readonly start: number;
  readonly end: number;
  readonly broadcast: boolean;
}

export interface ResolvedTracker {
  /** Length of each logical axis */
  readonly shape: readonly number[];
  /** Range of each logical axis */
  readonly ranges: readonly ConcreteRange[];
  /** Physical axis shown at each logical position */
  readonly order: readonly number[];
}

function isIdentity(order: readonly number[]): boolean {
  return order.every((axis, i) => axis === i);
}

function formatRange(range: AxisRange): string {
  const text = `[${range.start.toString()}, ${range.end.toString()})`;
  return range.broadcast ? `${text}*` : text;
}

// =============================================================================
// ShapeTracker
// =============================================================================

/**
 * Per-axis ranges plus axis order
 *
 * @example
 * const t = ShapeTracker.contiguous([4, 10]);
 * const s = t.slice([
 *   [Expression.ZERO, Expression.from(4)],
 *   [Expression.from(2), Expression.from(8)],
 * ]);
 * s.lengths().map(String); // ['4', '6']
 * s.isContiguous();        // false
 */
export class ShapeTracker {
  private constructor(
    /** Physical axes */
    readonly axes: readonly AxisRange[],
    /** Physical axis index for each logical axis */
    readonly order: readonly number[],
  ) {}

  /**
   * Tracker covering whole storage of the given sizes in row-major order
   */
  static contiguous(sizes: readonly ExpressionLike[]): ShapeTracker {
    const axes = sizes.map((value) => {
      const size = Expression.from(value);
      return { start: Expression.ZERO, end: size, size, broadcast: false };
    });
    return new ShapeTracker(
      axes,
      axes.map((_, i) => i),
    );
  }

  get rank(): number {
    return this.order.length;
  }

  /**
   * Physical axis shown at logical position `axis`
   */
  private axisAt(axis: number): AxisRange {
    const physical = this.order[axis];
    const range = physical === undefined ? undefined : this.axes[physical];
    if (range === undefined) {
      throw new InvalidRangeError(
        'tracker',
        `axis ${axis.toString()} is out of bounds for rank ${this.rank.toString()}`,
      );
    }
    return range;
  }

  /**
   * Ranges in logical order
   */
  ranges(): AxisRange[] {
    return this.order.map((_, axis) => this.axisAt(axis));
  }

  /**
   * Length `end - start` of each logical axis
   */
  lengths(): Expression[] {
    return this.ranges().map((range) => range.end.sub(range.start));
  }

  /**
   * Number of elements presented by the view
   */
  elementCount(): Expression {
    return this.lengths().reduce((acc, length) => acc.mul(length), Expression.ONE);
  }

  /**
   * Narrow each logical axis by a `[start, end)` relative to its current range
   *
   * Composes `[s, e)` on `[s0, e0)` into `[s0 + s, min(s0 + e, e0))`. Missing
   * trailing ranges keep their axis whole.
   */
  slice(ranges: readonly ResolvedRange[]): ShapeTracker {
    if (ranges.length > this.rank) {
      throw new InvalidRangeError(
        'slice',
        `${ranges.length.toString()} ranges given for rank ${this.rank.toString()}`,
      );
    }

    const axes = [...this.axes];
    ranges.forEach(([start, end], axis) => {
      rejectNegative('slice', axis, start, end);
      rejectReversed('slice', axis, start, end);
      const current = this.axisAt(axis);
      const composedStart = current.start.add(start);
      const composedEnd = current.start.add(end).min(current.end);
      rejectReversed('slice', axis, composedStart, composedEnd);

      const physical = this.order[axis];
      if (physical !== undefined) {
        axes[physical] = { ...current, start: composedStart, end: composedEnd };
      }
    });

    return new ShapeTracker(axes, this.order);
  }

  /**
   * Reorder logical axes; output axis i is input axis `axes[i]`
   */
  permute(axes: readonly number[]): ShapeTracker {
    const normalized = validatePermutationAxes(this.rank, axes);
    return new ShapeTracker(this.axes, permuteItems(this.order, normalized));
  }

  /**
   * Insert a broadcast axis of `size` at logical position `axis`
   */
  expand(axis: number, size: ExpressionLike): ShapeTracker {
    const position = normalizeAxis('expand', axis, this.rank + 1);
    const extent = Expression.from(size);
    const physical = this.axes.length;
    return new ShapeTracker(
      [...this.axes, { start: Expression.ZERO, end: extent, size: extent, broadcast: true }],
      insertAt(this.order, position, physical),
    );
  }

  /**
   * Repeat a length-1 logical axis `size` times
   */
  broadcastAxis(axis: number, size: ExpressionLike): ShapeTracker {
    const position = normalizeAxis('expand', axis, this.rank);
    const current = this.axisAt(position);
    const length = current.end.sub(current.start).tryToNumber();
    if (length !== undefined && length !== 1) {
      throw new InvalidRangeError(
        'expand',
        `axis ${position.toString()} has length ${length.toString()}; only length-1 axes can be broadcast`,
      );
    }

    const extent = Expression.from(size);
    const physical = this.order[position];
    const axes = [...this.axes];
    if (physical !== undefined) {
      axes[physical] = { start: Expression.ZERO, end: extent, size: extent, broadcast: true };
    }
    return new ShapeTracker(axes, this.order);
  }

  /**
   * Whole storage, in storage order, without broadcast axes
   */
  isContiguous(): boolean {
    return (
      isIdentity(this.order) &&
      this.axes.every(
        (range) => !range.broadcast && range.start.equals(0) && range.end.equals(range.size),
      )
    );
  }

  /**
   * Inverse of the current axis order
   */
  inverseOrder(): number[] {
    return invertPermutation(this.order);
  }

  /**
   * Replace bound symbols in every range
   */
  substitute(bindings: SymbolBindings): ShapeTracker {
    return new ShapeTracker(
      this.axes.map((range) => ({
        start: range.start.substitute(bindings),
        end: range.end.substitute(bindings),
        size: range.size.substitute(bindings),
        broadcast: range.broadcast,
      })),
      this.order,
    );
  }

  /**
   * Concrete ranges under a complete symbol binding
   */
  resolve(bindings: SymbolBindings): ResolvedTracker {
    const ranges = this.ranges().map((range, axis) => {
      const start = range.start.evaluate(bindings);
      const end = range.end.evaluate(bindings);
      if (start < 0 || start > end) {
        throw new InvalidRangeError(
          'resolve',
          `axis ${axis.toString()} resolves to [${start.toString()}, ${end.toString()})`,
          { start: range.start.toString(), end: range.end.toString() },
        );
      }
      return { start, end, broadcast: range.broadcast };
    });

    return {
      shape: ranges.map((range) => range.end - range.start),
      ranges,
      order: [...this.order],
    };
  }

  equals(other: ShapeTracker): boolean {
    return (
      this.order.length === other.order.length &&
      this.order.every((axis, i) => axis === other.order[i]) &&
      this.axes.length === other.axes.length &&
      this.axes.every((range, i) => {
        const theirs = other.axes[i];
        return (
          theirs !== undefined &&
          range.broadcast === theirs.broadcast &&
          range.start.equals(theirs.start) &&
          range.end.equals(theirs.end) &&
          range.size.equals(theirs.size)
        );
      })
    );
  }

  toString(): string {
    const ranges = this.ranges().map(formatRange).join(', ');
    return isIdentity(this.order)
      ? `ShapeTracker(${ranges})`
      : `ShapeTracker(${ranges} | order=[${this.order.join(', ')}])`;
  }
}

function rejectNegative(operation: string, axis: number, start: Expression, end: Expression): void {
  const s = start.tryToNumber();
  const e = end.tryToNumber();
  if ((s !== undefined && s < 0) || (e !== undefined && e < 0)) {
    throw new InvalidRangeError(
      operation,
      `range [${start.toString()}, ${end.toString()}) on axis ${axis.toString()} starts before storage`,
    );
  }
}

function rejectReversed(operation: string, axis: number, start: Expression, end: Expression): void {
  const s = start.tryToNumber();
  const e = end.tryToNumber();
  if (s !== undefined && e !== undefined && s > e) {
    throw new InvalidRangeError(
      operation,
      `range [${s.toString()}, ${e.toString()}) on axis ${axis.toString()} has start after end`,
    );
  }
}
