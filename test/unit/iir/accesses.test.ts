import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  accessIdsOf,
  accesses,
  accessesEqual,
  emptyAccesses,
  hasDataDependency,
  isSubsetOf,
  mergeAccesses,
  overlaps,
} from '../../../src/iir/accesses.js';
import { extentsFromOffset, zeroExtents } from '../../../src/iir/extent.js';

describe('accesses', () => {
  it('merges the extents of the same AccessID and keeps the others', () => {
    const a = accesses([[1, extentsFromOffset([1, 0, 0])]], [[2, zeroExtents()]]);
    const b = accesses([[1, extentsFromOffset([-1, 0, 0])]], [[3, zeroExtents()]]);
    const merged = mergeAccesses(a, b);

    assert.deepEqual(merged.writes.get(1), [
      { minus: -1, plus: 1 },
      { minus: 0, plus: 0 },
      { minus: 0, plus: 0 },
    ]);
    assert.deepEqual([...merged.reads.keys()], [2, 3]);
  });

  it('compares footprints by AccessID and extent', () => {
    const a = accesses([[1, zeroExtents()]]);
    assert.equal(accessesEqual(a, accesses([[1, zeroExtents()]])), true);
    assert.equal(accessesEqual(a, accesses([[1, extentsFromOffset([0, 1, 0])]])), false);
    assert.equal(accessesEqual(a, emptyAccesses()), false);
  });

  it('checks inclusion with extents at least as large', () => {
    const small = accesses([], [[1, extentsFromOffset([1, 0, 0])]]);
    const large = accesses([[2, zeroExtents()]], [[1, extentsFromOffset([2, 0, 0])]]);
    assert.equal(isSubsetOf(small, large), true);
    assert.equal(isSubsetOf(large, small), false);
  });

  it('finds shared AccessIDs', () => {
    const writesOne = accesses([[1, zeroExtents()]]);
    const readsOne = accesses([], [[1, zeroExtents()]]);
    assert.equal(overlaps(writesOne, readsOne), true);
    assert.equal(overlaps(writesOne, accesses([[2, zeroExtents()]])), false);
  });

  it('reports read-after-write, write-after-read and write-after-write but not read-after-read', () => {
    const write = accesses([[1, zeroExtents()]]);
    const read = accesses([], [[1, zeroExtents()]]);
    assert.equal(hasDataDependency(write, read), true);
    assert.equal(hasDataDependency(read, write), true);
    assert.equal(hasDataDependency(write, write), true);
    assert.equal(hasDataDependency(read, read), false);
  });

  it('lists every AccessID once, writes first', () => {
    const a = accesses([[4, zeroExtents()]], [
      [2, zeroExtents()],
      [4, zeroExtents()],
      [-1, zeroExtents()],
    ]);
    assert.deepEqual(accessIdsOf(a), [4, 2, -1]);
  });
});
