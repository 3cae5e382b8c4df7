/**
 * @module geometry/clip
 *
 * Sutherland-Hodgman polygon clipping against a rectangle.
 *
 * Each ring is clipped against the X slab `[minX, maxX]` and the result
 * against the Y slab `[minY, maxY]`. Clipping a ring against one slab
 * always yields a single closed ring (or nothing), so a polygon keeps its
 * exterior/holes structure through the clip. Edges that run along the
 * clip border are left in; they cost a few bytes but render correctly.
 *
 * Coordinates are in mercator [0, 1] space, flat `[x0, y0, x1, y1, ...]`.
 */

import type { BBox } from '../types.js';
import type { PolygonRings } from './rings.js';

/** A clipped ring needs three distinct vertices plus the closing one. */
const MIN_RING_VALUES = 8;

/**
 * Clip polygons to `clip`.
 *
 * A polygon whose exterior is clipped away is dropped together with its
 * holes. A hole that is clipped away is dropped on its own.
 *
 * @returns Surviving polygons; rings are new arrays unless a polygon lies
 *   fully inside `clip`, in which case its rings are returned as they came.
 */
export function clipPolygons(polygons: readonly PolygonRings[], clip: BBox): PolygonRings[] {
  const result: PolygonRings[] = [];

  for (const rings of polygons) {
    const exterior = rings[0];
    if (exterior === undefined) continue;

    const box = ringBBox(exterior);
    if (box.maxX < clip.minX || box.minX > clip.maxX || box.maxY < clip.minY || box.minY > clip.maxY) {
      continue;
    }
    if (box.minX >= clip.minX && box.maxX <= clip.maxX && box.minY >= clip.minY && box.maxY <= clip.maxY) {
      // Holes lie inside their exterior, so they are inside too.
      result.push(rings);
      continue;
    }

    const clippedExterior = clipRing(exterior, clip);
    if (clippedExterior === null) continue;

    const clipped: PolygonRings = [clippedExterior];
    for (let i = 1; i < rings.length; i++) {
      const hole = clipRing(rings[i], clip);
      if (hole !== null) clipped.push(hole);
    }
    result.push(clipped);
  }

  return result;
}

/**
 * Clip one ring to a rectangle.
 *
 * @returns The closed clipped ring, or `null` when fewer than three
 *   vertices survive.
 */
export function clipRing(ring: Float64Array, clip: BBox): Float64Array | null {
  const closed = closeRing(ring);
  if (closed.length < MIN_RING_VALUES) return null;

  const xClipped = clipRingAxis(closed, clip.minX, clip.maxX, 0);
  if (xClipped.length < MIN_RING_VALUES) return null;

  const yClipped = clipRingAxis(xClipped, clip.minY, clip.maxY, 1);
  if (yClipped.length < MIN_RING_VALUES) return null;

  return new Float64Array(yClipped);
}

// ─── Internals ──────────────────────────────────────────────────────────────

function ringBBox(xy: ArrayLike<number>): BBox {
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (let i = 0; i < xy.length; i += 2) {
    const x = xy[i], y = xy[i + 1];
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return { minX, minY, maxX, maxY };
}

/** Coordinates of `ring` as a plain array whose last vertex equals its first. */
function closeRing(ring: Float64Array): number[] {
  const out = Array.from(ring);
  const n = out.length;
  if (n >= 2 && (out[0] !== out[n - 2] || out[1] !== out[n - 1])) {
    out.push(out[0], out[1]);
  }
  return out;
}

/**
 * Clip a closed ring against the slab `k1 <= v <= k2` on one axis.
 *
 * Walks every edge a → b: an inside `a` is kept, and each slab border the
 * edge crosses contributes one intersection vertex, in crossing order.
 */
function clipRingAxis(coords: readonly number[], k1: number, k2: number, axis: 0 | 1): number[] {
  const out: number[] = [];
  const n = coords.length;

  for (let i = 0; i + 3 < n; i += 2) {
    const ax = coords[i], ay = coords[i + 1];
    const bx = coords[i + 2], by = coords[i + 3];
    const a = axis === 0 ? ax : ay;
    const b = axis === 0 ? bx : by;

    if (a < k1) {
      if (b > k1) intersect(out, ax, ay, bx, by, k1, axis);
      if (b > k2) intersect(out, ax, ay, bx, by, k2, axis);
    } else if (a > k2) {
      if (b < k2) intersect(out, ax, ay, bx, by, k2, axis);
      if (b < k1) intersect(out, ax, ay, bx, by, k1, axis);
    } else {
      out.push(ax, ay);
      if (b < k1) intersect(out, ax, ay, bx, by, k1, axis);
      else if (b > k2) intersect(out, ax, ay, bx, by, k2, axis);
    }
  }

  const m = out.length;
  if (m >= 2 && (out[0] !== out[m - 2] || out[1] !== out[m - 1])) {
    out.push(out[0], out[1]);
  }
  return out;
}

/** Append the point where edge a → b crosses `v = k` on `axis`. */
function intersect(
  out: number[],
  ax: number, ay: number,
  bx: number, by: number,
  k: number,
  axis: 0 | 1,
): void {
  if (axis === 0) {
    const t = (k - ax) / (bx - ax);
    out.push(k, ay + (by - ay) * t);
  } else {
    const t = (k - ay) / (by - ay);
    out.push(ax + (bx - ax) * t, k);
  }
}
