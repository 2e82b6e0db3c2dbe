/**
 * @module iir/interval
 *
 * Vertical interval `[lower, upper]`. A bound is a level plus an offset; the level is `Start`, `End`
 * or a concrete integer level.
 *
 * Bound order:
 * - two concrete levels compare by `level + offset`;
 * - otherwise levels rank `Start < integer < End`, and equal symbolic levels compare by offset.
 */

import { DiagnosticCode, IrError } from '../diagnostics/diagnostics.js';
import type { Interval as IntervalShape, IntervalBound, IntervalLevel, SourceLocation } from '../types.js';

export type Interval = IntervalShape;

const START: IntervalLevel = Object.freeze({ kind: 'Start' });
const END: IntervalLevel = Object.freeze({ kind: 'End' });

export const Bound = {
  start: (offset = 0): IntervalBound => ({ level: START, offset }),
  end: (offset = 0): IntervalBound => ({ level: END, offset }),
  level: (value: number, offset = 0): IntervalBound => ({ level: { kind: 'Level', value }, offset }),
};

function rank(level: IntervalLevel): number {
  switch (level.kind) {
    case 'Start':
      return 0;
    case 'Level':
      return 1;
    case 'End':
      return 2;
  }
}

/** Negative when `a` lies below `b`, zero when equal, positive when above. */
export function compareBounds(a: IntervalBound, b: IntervalBound): number {
  if (a.level.kind === 'Level' && b.level.kind === 'Level') {
    return a.level.value + a.offset - (b.level.value + b.offset);
  }
  const byRank = rank(a.level) - rank(b.level);
  return byRank !== 0 ? byRank : a.offset - b.offset;
}

export function isValidInterval(interval: Interval): boolean {
  return compareBounds(interval.lower, interval.upper) <= 0;
}

export function boundToString(bound: IntervalBound): string {
  const level = bound.level.kind === 'Level' ? String(bound.level.value) : bound.level.kind.toLowerCase();
  if (bound.offset === 0) return level;
  return bound.offset > 0 ? `${level}+${bound.offset}` : `${level}${bound.offset}`;
}

export function intervalToString(interval: Interval): string {
  return `[${boundToString(interval.lower)}, ${boundToString(interval.upper)}]`;
}

export function intervalOrderError(interval: Interval, location?: SourceLocation): IrError {
  return new IrError(
    DiagnosticCode.V001_IntervalOrder,
    `Interval ${intervalToString(interval)} has its lower bound above its upper bound`,
    location ? { location } : {}
  );
}

export const Interval = {
  /** Checked constructor; an ill-ordered interval is an InvariantViolation. */
  create(lower: IntervalBound, upper: IntervalBound): Interval {
    const interval = { lower, upper };
    if (!isValidInterval(interval)) throw intervalOrderError(interval);
    return interval;
  },

  /** Unchecked constructor, for decoding; `validate()` reports what this lets through. */
  raw(lower: IntervalBound, upper: IntervalBound): Interval {
    return { lower, upper };
  },

  /** The whole vertical domain, `[start, end]`. */
  full(): Interval {
    return { lower: Bound.start(), upper: Bound.end() };
  },
};
