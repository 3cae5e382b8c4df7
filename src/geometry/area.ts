/**
 * @module geometry/area
 *
 * Planar footprint area in EPSG:3857 (spherical Web Mercator, metres).
 *
 * The value is the area of the projected polygon, not the true ground
 * area; it grows with latitude the way the map does. It is what the stats
 * consumer sums for a viewport.
 */

import type { PolygonGeometry } from '../types.js';
import { splitPolygons } from './rings.js';

/** WGS84 semi-major axis used by EPSG:3857. */
export const EARTH_RADIUS = 6378137;

/** Latitude at which EPSG:3857 is cut off. */
const MAX_LATITUDE = 85.0511287798;

const DEG = Math.PI / 180;

/**
 * Project a WGS84 coordinate to EPSG:3857 metres.
 *
 * @example
 * ```ts
 * toWebMercator(180, 0)[0]; // => 20037508.342789244
 * ```
 */
export function toWebMercator(lng: number, lat: number): [number, number] {
  const clamped = Math.max(-MAX_LATITUDE, Math.min(MAX_LATITUDE, lat));
  return [
    EARTH_RADIUS * lng * DEG,
    EARTH_RADIUS * Math.log(Math.tan(Math.PI / 4 + (clamped * DEG) / 2)),
  ];
}

/**
 * EPSG:3857 area of a WGS84 polygon or multipolygon in square metres.
 *
 * Each polygon contributes its exterior area minus the area of its holes;
 * ring orientation does not matter.
 */
export function mercatorArea(geometry: PolygonGeometry): number {
  let total = 0;
  for (const rings of splitPolygons(geometry)) {
    rings.forEach((ring, i) => {
      const area = Math.abs(ringArea(ring));
      total += i === 0 ? area : -area;
    });
  }
  return total;
}

/** Signed shoelace area of one WGS84 ring after projection. */
function ringArea(ring: Float64Array): number {
  const n = ring.length / 2;
  if (n < 3) return 0;

  let sum = 0;
  let [px, py] = toWebMercator(ring[2 * (n - 1)], ring[2 * (n - 1) + 1]);
  for (let i = 0; i < n; i++) {
    const [x, y] = toWebMercator(ring[2 * i], ring[2 * i + 1]);
    sum += px * y - x * py;
    px = x;
    py = y;
  }
  return sum / 2;
}
