/**
 * @module iir/accesses
 *
 * Read/write footprints of a statement. Both mappings are keyed by AccessID; merging takes the
 * per-dimension union of the extents of the same ID.
 */

import type { AccessID, Iir } from '../types.js';
import { extentsContain, extentsEqual, mergeExtents } from './extent.js';

type ExtentMap = ReadonlyMap<AccessID, Iir.Extents>;

export function emptyAccesses(): Iir.Accesses {
  return { writes: new Map(), reads: new Map() };
}

export function accesses(
  writes: Iterable<readonly [AccessID, Iir.Extents]> = [],
  reads: Iterable<readonly [AccessID, Iir.Extents]> = []
): Iir.Accesses {
  return { writes: new Map(writes), reads: new Map(reads) };
}

function mergeMaps(a: ExtentMap, b: ExtentMap): Map<AccessID, Iir.Extents> {
  const out = new Map(a);
  for (const [id, extents] of b) {
    const existing = out.get(id);
    out.set(id, existing ? mergeExtents(existing, extents) : extents);
  }
  return out;
}

export function mergeAccesses(a: Iir.Accesses, b: Iir.Accesses): Iir.Accesses {
  return { writes: mergeMaps(a.writes, b.writes), reads: mergeMaps(a.reads, b.reads) };
}

/** Adds one access to a mutable builder map, merging with any earlier extent of the same ID. */
export function addAccess(map: Map<AccessID, Iir.Extents>, id: AccessID, extents: Iir.Extents): void {
  const existing = map.get(id);
  map.set(id, existing ? mergeExtents(existing, extents) : extents);
}

function mapIsSubset(a: ExtentMap, b: ExtentMap): boolean {
  for (const [id, extents] of a) {
    const other = b.get(id);
    if (!other || !extentsContain(other, extents)) return false;
  }
  return true;
}

/** Every access of `a` appears in `b` with an extent at least as large. */
export function isSubsetOf(a: Iir.Accesses, b: Iir.Accesses): boolean {
  return mapIsSubset(a.writes, b.writes) && mapIsSubset(a.reads, b.reads);
}

function sharesKey(a: ExtentMap, b: ExtentMap): boolean {
  for (const id of a.keys()) {
    if (b.has(id)) return true;
  }
  return false;
}

/** Some AccessID is touched by both footprints. */
export function overlaps(a: Iir.Accesses, b: Iir.Accesses): boolean {
  return (
    sharesKey(a.writes, b.writes) ||
    sharesKey(a.writes, b.reads) ||
    sharesKey(a.reads, b.writes) ||
    sharesKey(a.reads, b.reads)
  );
}

/**
 * `later` depends on `earlier`: read-after-write, write-after-read or write-after-write on a
 * common AccessID. Two reads never form a dependency.
 */
export function hasDataDependency(earlier: Iir.Accesses, later: Iir.Accesses): boolean {
  return (
    sharesKey(earlier.writes, later.reads) ||
    sharesKey(earlier.reads, later.writes) ||
    sharesKey(earlier.writes, later.writes)
  );
}

function mapsEqual(a: ExtentMap, b: ExtentMap): boolean {
  if (a.size !== b.size) return false;
  for (const [id, extents] of a) {
    const other = b.get(id);
    if (!other || !extentsEqual(extents, other)) return false;
  }
  return true;
}

export function accessesEqual(a: Iir.Accesses, b: Iir.Accesses): boolean {
  return mapsEqual(a.writes, b.writes) && mapsEqual(a.reads, b.reads);
}

/** Every AccessID mentioned by the footprint, writes first. */
export function accessIdsOf(a: Iir.Accesses): AccessID[] {
  return [...new Set([...a.writes.keys(), ...a.reads.keys()])];
}
