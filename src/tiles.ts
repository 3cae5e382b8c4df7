/**
 * @module tiles
 *
 * Tile coordinate mapping.
 *
 * Converts slippy map tile addresses (z/x/y) into the two coordinate spaces
 * used while serving a tile:
 *
 * - **WGS84** bounding boxes (longitude/latitude) for the spatial store
 *   query.
 * - **Mercator [0, 1]** clip bounds, expanded by the tile buffer, for the
 *   polygon clipper.
 *
 * Everything here is pure. {@link TileBoundsCache} memoizes both
 * conversions and only ever stores immutable values, so one instance can be
 * shared by all in-flight requests.
 */

import type { BBox } from './types.js';

const PI = Math.PI;

/** Largest zoom whose tile indices stay exact in 32-bit shifts. */
export const MAX_SUPPORTED_ZOOM = 30;

// ─── Tile ID ────────────────────────────────────────────────────────────────

/**
 * Pack a tile address into a single number for use as a `Map` key.
 *
 * @example
 * ```typescript
 * tileId(0, 0, 0); // => 0
 * tileId(2, 3, 1); // => 226
 * ```
 */
export function tileId(z: number, x: number, y: number): number {
  return (2 ** z * y + x) * 32 + z;
}

/**
 * Whether (z, x, y) names an existing tile: integers with
 * `0 <= z <= maxZoom` and `0 <= x, y < 2^z`.
 *
 * @param maxZoom - Highest zoom the caller accepts.
 */
export function isValidTile(z: number, x: number, y: number, maxZoom: number = MAX_SUPPORTED_ZOOM): boolean {
  if (!Number.isInteger(z) || !Number.isInteger(x) || !Number.isInteger(y)) return false;
  if (z < 0 || z > Math.min(maxZoom, MAX_SUPPORTED_ZOOM)) return false;
  const n = 2 ** z;
  return x >= 0 && x < n && y >= 0 && y < n;
}

// ─── Tile → WGS84 BBox ─────────────────────────────────────────────────────

/**
 * Convert a tile address to its WGS84 bounding box.
 *
 * Longitude is linear in the column; latitude follows the inverse Web
 * Mercator transform, with `y = 0` at the northern edge:
 *
 * ```
 * n      = 2^z
 * minLon = x / n * 360 - 180
 * maxLon = (x + 1) / n * 360 - 180
 * lat(r) = degrees(atan(sinh(π · (1 - 2r / n))))
 * maxLat = lat(y), minLat = lat(y + 1)
 * ```
 *
 * Neighbouring tiles evaluate the same expression for their shared edge, so
 * their boxes meet exactly.
 *
 * @returns `minX`/`maxX` as longitude and `minY`/`maxY` as latitude.
 *
 * @example
 * ```typescript
 * tileBBox(0, 0, 0);
 * // { minX: -180, minY: -85.0511..., maxX: 180, maxY: 85.0511... }
 * ```
 */
export function tileBBox(z: number, x: number, y: number): BBox {
  const n = 2 ** z;
  return {
    minX: tileLonDeg(x, n),
    minY: tileLatDeg(y + 1, n),
    maxX: tileLonDeg(x + 1, n),
    maxY: tileLatDeg(y, n),
  };
}

function tileLonDeg(x: number, n: number): number {
  return (x / n) * 360 - 180;
}

function tileLatDeg(y: number, n: number): number {
  const latRad = Math.atan(Math.sinh(PI * (1 - (2 * y) / n)));
  return (latRad * 180) / PI;
}

// ─── Tile → Mercator Clip Bounds ────────────────────────────────────────────

/**
 * Buffered clip bounds in Mercator [0, 1] space for a tile.
 *
 * `buffer` is in tile units; dividing by `extent` gives the fraction of a
 * tile added on every side.
 *
 * @example
 * ```typescript
 * const clip = tileClipBounds(0, 0, 0, 64, 4096);
 * // clip.minX ≈ -0.0156, clip.maxX ≈ 1.0156
 * ```
 */
export function tileClipBounds(
  z: number,
  x: number,
  y: number,
  buffer: number,
  extent: number,
): BBox {
  const n = 2 ** z;
  const k = buffer / extent;
  return {
    minX: (x - k) / n,
    minY: (y - k) / n,
    maxX: (x + 1 + k) / n,
    maxY: (y + 1 + k) / n,
  };
}

// ─── Cached Tile Bounds ─────────────────────────────────────────────────────

/**
 * Memoizes {@link tileBBox} and {@link tileClipBounds}.
 *
 * Clip bounds are keyed by buffer and extent as well as the tile, so one
 * cache serves callers with different encoder settings. Cached boxes are
 * frozen.
 *
 * @example
 * ```typescript
 * const cache = new TileBoundsCache();
 * const wgs84 = cache.getWgs84(14, 8424, 5405);
 * const clip = cache.getClip(14, 8424, 5405, 64, 4096);
 * ```
 */
export class TileBoundsCache {
  private readonly wgs84 = new Map<number, Readonly<BBox>>();
  private readonly clip = new Map<string, Readonly<BBox>>();

  /** Cached WGS84 box for a tile. */
  getWgs84(z: number, x: number, y: number): Readonly<BBox> {
    const id = tileId(z, x, y);
    let bbox = this.wgs84.get(id);
    if (!bbox) {
      bbox = Object.freeze(tileBBox(z, x, y));
      this.wgs84.set(id, bbox);
    }
    return bbox;
  }

  /** Cached buffered Mercator clip box for a tile. */
  getClip(z: number, x: number, y: number, buffer: number, extent: number): Readonly<BBox> {
    const key = `${tileId(z, x, y)}:${buffer}:${extent}`;
    let bbox = this.clip.get(key);
    if (!bbox) {
      bbox = Object.freeze(tileClipBounds(z, x, y, buffer, extent));
      this.clip.set(key, bbox);
    }
    return bbox;
  }

  /** Number of cached entries across both compartments. */
  get size(): number {
    return this.wgs84.size + this.clip.size;
  }
}
