import type { Int3, Iir } from '../types.js';

export const ZERO_EXTENT: Iir.Extent = Object.freeze({ minus: 0, plus: 0 });

export function extent(minus: number, plus: number): Iir.Extent {
  return { minus, plus };
}

export function zeroExtents(): Iir.Extents {
  return [ZERO_EXTENT, ZERO_EXTENT, ZERO_EXTENT];
}

/** Union of two footprints along one dimension. */
export function mergeExtent(a: Iir.Extent, b: Iir.Extent): Iir.Extent {
  return { minus: Math.min(a.minus, b.minus), plus: Math.max(a.plus, b.plus) };
}

export function mergeExtents(a: Iir.Extents, b: Iir.Extents): Iir.Extents {
  return [mergeExtent(a[0], b[0]), mergeExtent(a[1], b[1]), mergeExtent(a[2], b[2])];
}

/** Footprint of one access at `offset`, always including the center point. */
export function extentsFromOffset(offset: Int3): Iir.Extents {
  const along = (o: number): Iir.Extent => ({ minus: Math.min(0, o), plus: Math.max(0, o) });
  return [along(offset[0]), along(offset[1]), along(offset[2])];
}

export function extentsEqual(a: Iir.Extents, b: Iir.Extents): boolean {
  return a.every((e, i) => {
    const other = b[i];
    return other !== undefined && e.minus === other.minus && e.plus === other.plus;
  });
}

/** True when `inner` lies within `outer` in every dimension. */
export function extentsContain(outer: Iir.Extents, inner: Iir.Extents): boolean {
  return outer.every((o, i) => {
    const e = inner[i];
    return e !== undefined && o.minus <= e.minus && e.plus <= o.plus;
  });
}

export function extentsToString(extents: Iir.Extents): string {
  return `[${extents.map(e => `(${e.minus},${e.plus})`).join(', ')}]`;
}
