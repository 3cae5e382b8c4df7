/**
 * @module geometry/project
 *
 * Web Mercator projection from WGS84 to normalized mercator [0, 1] space.
 *
 * - **X**: 0 = 180°W, 0.5 = prime meridian, 1 = 180°E.
 * - **Y**: 0 = north edge, 1 = south edge (Y-down, like tile rows),
 *   clamped to [0, 1], which is about ±85.0511° latitude.
 *
 * Clipping and quantization work in this space; tile coordinates follow by
 * scaling with `2^z` and the extent.
 */

import type { PolygonGeometry } from '../types.js';

const PI = Math.PI;

/**
 * @example
 * ```ts
 * projectX(0);    // => 0.5
 * projectX(-180); // => 0
 * ```
 */
export function projectX(lng: number): number {
  return lng / 360 + 0.5;
}

/**
 * @example
 * ```ts
 * projectY(0);  // => 0.5
 * projectY(90); // => 0 (clamped)
 * ```
 */
export function projectY(lat: number): number {
  const sin = Math.sin((lat * PI) / 180);
  const y = 0.5 - (0.25 * Math.log((1 + sin) / (1 - sin))) / PI;
  return y < 0 ? 0 : y > 1 ? 1 : y;
}

/**
 * Project a building geometry into mercator space.
 *
 * Returns a new geometry; the rings and parts index arrays are shared with
 * the input since projection does not change them.
 */
export function projectGeometry(geometry: PolygonGeometry): PolygonGeometry {
  const src = geometry.xy;
  const xy = new Float64Array(src.length);
  for (let i = 0; i < src.length; i += 2) {
    xy[i] = projectX(src[i]);
    xy[i + 1] = projectY(src[i + 1]);
  }
  return { xy, ends: geometry.ends, parts: geometry.parts };
}
