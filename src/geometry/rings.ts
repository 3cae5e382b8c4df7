/**
 * @module geometry/rings
 *
 * Splitting a flat {@link PolygonGeometry} into polygons and rings.
 */

import type { PolygonGeometry } from '../types.js';

/**
 * Rings of one polygon: the exterior first, then its holes. Each ring is a
 * flat `[x0, y0, x1, y1, ...]` view into the source coordinates.
 */
export type PolygonRings = Float64Array[];

/**
 * Split `geometry` into polygons using its `ends` and `parts` arrays.
 *
 * Rings are zero-copy subarrays of `geometry.xy`. Empty rings are kept so
 * that ring positions stay aligned with `ends`.
 *
 * @example
 * ```ts
 * // ends = [5, 9, 14], parts = [0, 2]
 * splitPolygons(g); // => [[ring0, ring1], [ring2]]
 * ```
 */
export function splitPolygons(geometry: PolygonGeometry): PolygonRings[] {
  const { xy, ends, parts } = geometry;
  const rings: Float64Array[] = [];
  let start = 0;
  for (let i = 0; i < ends.length; i++) {
    const end = Math.min(ends[i] * 2, xy.length);
    rings.push(xy.subarray(start, Math.max(start, end)));
    start = Math.max(start, end);
  }

  const polygons: PolygonRings[] = [];
  for (let p = 0; p < parts.length; p++) {
    const first = parts[p];
    const last = p + 1 < parts.length ? parts[p + 1] : rings.length;
    if (first >= rings.length || last <= first) continue;
    polygons.push(rings.slice(first, last));
  }
  return polygons;
}
