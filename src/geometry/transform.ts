/**
 * @module geometry/transform
 *
 * Quantization of clipped mercator rings to integer tile coordinates,
 * followed by ring cleanup and MVT winding.
 *
 * For a tile (z, tx, ty):
 * ```
 * tileX = round(extent * (mercX * 2^z - tx))
 * tileY = round(extent * (mercY * 2^z - ty))
 * ```
 *
 * Rounding can collapse neighbouring vertices and flatten thin rings, so
 * every quantized ring is deduplicated and dropped if it no longer encloses
 * any area. MVT 2.1 then requires a positive surveyor's-formula area for
 * exterior rings and a negative one for holes, in Y-down tile coordinates.
 */

import type { TileAddress } from '../types.js';
import type { PolygonRings } from './rings.js';

/** Rings of one polygon in tile coordinates, exterior first. */
export type TileRings = Int32Array[];

/**
 * Quantize clipped polygons to tile coordinates and fix their winding.
 *
 * A polygon is dropped when its exterior degenerates; a degenerate hole is
 * dropped on its own.
 *
 * @param polygons - Clipped rings in mercator space.
 */
export function quantizePolygons(
  polygons: readonly PolygonRings[],
  tile: TileAddress,
  extent: number,
): TileRings[] {
  const result: TileRings[] = [];

  for (const rings of polygons) {
    const exterior = rings[0];
    if (exterior === undefined) continue;

    const outer = cleanRing(transformToTile(exterior, tile, extent));
    if (outer === null) continue;
    ensureWinding(outer, true);

    const quantized: TileRings = [outer];
    for (let i = 1; i < rings.length; i++) {
      const hole = cleanRing(transformToTile(rings[i], tile, extent));
      if (hole === null) continue;
      ensureWinding(hole, false);
      quantized.push(hole);
    }
    result.push(quantized);
  }

  return result;
}

/**
 * Map mercator coordinates into the tile's integer space.
 *
 * @example
 * ```ts
 * // Tile 1/0/0 covers the north-west quadrant; (0.25, 0.25) is its centre.
 * transformToTile(new Float64Array([0.25, 0.25]), { z: 1, x: 0, y: 0 }, 4096);
 * // => Int32Array [2048, 2048]
 * ```
 */
export function transformToTile(xy: Float64Array, tile: TileAddress, extent: number): Int32Array {
  const n = 2 ** tile.z;
  const out = new Int32Array(xy.length);
  for (let i = 0; i < xy.length; i += 2) {
    out[i] = Math.round(extent * (xy[i] * n - tile.x));
    out[i + 1] = Math.round(extent * (xy[i + 1] * n - tile.y));
  }
  return out;
}

/**
 * Remove consecutive duplicate vertices and make sure the ring is closed.
 *
 * @returns The cleaned ring, or `null` if it has fewer than four vertices
 *   (three distinct plus the closing one) or zero area.
 */
export function cleanRing(coords: Int32Array): Int32Array | null {
  const out: number[] = [];
  for (let i = 0; i + 1 < coords.length; i += 2) {
    const x = coords[i], y = coords[i + 1];
    const m = out.length;
    if (m >= 2 && out[m - 2] === x && out[m - 1] === y) continue;
    out.push(x, y);
  }

  const m = out.length;
  if (m >= 2 && (out[0] !== out[m - 2] || out[1] !== out[m - 1])) {
    out.push(out[0], out[1]);
  }

  if (out.length < 8) return null;
  const ring = Int32Array.from(out);
  return signedArea(ring) === 0 ? null : ring;
}

/**
 * Twice the signed area of a closed ring by the surveyor's formula,
 * `Σ (x_i · y_{i+1} − x_{i+1} · y_i)`.
 *
 * In Y-down tile coordinates a positive value means the ring runs
 * clockwise on screen.
 *
 * @example
 * ```ts
 * signedArea([0, 0, 10, 0, 10, 10, 0, 10, 0, 0]); // => 200
 * ```
 */
export function signedArea(coords: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i + 3 < coords.length; i += 2) {
    sum += coords[i] * coords[i + 3] - coords[i + 2] * coords[i + 1];
  }
  return sum;
}

/**
 * Reverse `ring` in place unless its area sign already matches the role:
 * positive for an exterior ring, negative for a hole.
 */
export function ensureWinding(ring: Int32Array, exterior: boolean): void {
  if ((signedArea(ring) > 0) !== exterior) reverseRing(ring);
}

function reverseRing(coords: Int32Array): void {
  for (let i = 0, j = coords.length - 2; i < j; i += 2, j -= 2) {
    const tx = coords[i], ty = coords[i + 1];
    coords[i] = coords[j];
    coords[i + 1] = coords[j + 1];
    coords[j] = tx;
    coords[j + 1] = ty;
  }
}
