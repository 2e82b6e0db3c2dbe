import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DiagnosticCode, IrErrorKind, isIrError } from '../../../src/diagnostics/diagnostics.js';
import { Bound, Interval, compareBounds, intervalToString, isValidInterval } from '../../../src/iir/interval.js';

describe('Interval', () => {
  it('accepts the full column', () => {
    const interval = Interval.create(Bound.start(), Bound.end());
    assert.equal(intervalToString(interval), '[start, end]');
  });

  it('rejects a lower bound above the upper bound', () => {
    assert.throws(
      () => Interval.create(Bound.end(1), Bound.start()),
      (e: unknown) => isIrError(e, IrErrorKind.InvariantViolation) && e.code === DiagnosticCode.V001_IntervalOrder
    );
  });

  it('lets the unchecked constructor through for validation to report', () => {
    assert.equal(isValidInterval(Interval.raw(Bound.end(1), Bound.start())), false);
  });

  describe('compareBounds', () => {
    it('compares concrete levels by level plus offset', () => {
      assert.equal(compareBounds(Bound.level(5), Bound.level(3, 2)), 0);
      assert.equal(compareBounds(Bound.level(2, 1), Bound.level(3, -1)), 1);
    });

    it('ranks start below concrete levels below end', () => {
      assert.ok(compareBounds(Bound.start(10), Bound.level(0)) < 0);
      assert.ok(compareBounds(Bound.level(100), Bound.end(-5)) < 0);
    });

    it('breaks ties between equal symbolic levels by offset', () => {
      assert.ok(compareBounds(Bound.end(-1), Bound.end()) < 0);
      assert.ok(compareBounds(Bound.start(2), Bound.start(1)) > 0);
    });
  });

  it('prints offsets with their sign', () => {
    assert.equal(intervalToString(Interval.create(Bound.start(1), Bound.end(-1))), '[start+1, end-1]');
    assert.equal(intervalToString(Interval.create(Bound.level(3, -1), Bound.level(3, 2))), '[3-1, 3+2]');
  });
});
