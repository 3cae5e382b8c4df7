/**
 * @module tile
 *
 * Buildings to MVT bytes.
 *
 * {@link encodeTile} is pure: it takes buildings already read from the
 * store and the tile address, and returns an encoded tile with a single
 * layer. Store access, timeouts and the zoom policy live in
 * {@link TileService}.
 *
 * @example
 * ```typescript
 * const buildings = await pool.withHandle((s) => s.queryInBBox(tileBBox(15, 16848, 10810)));
 * const bytes = encodeTile(buildings, { z: 15, x: 16848, y: 10810 });
 * ```
 */

import type { Building, TileAddress } from './types.js';
import type { TileOptions } from './options.js';
import { resolveTileOptions } from './options.js';
import { tileClipBounds, type TileBoundsCache } from './tiles.js';
import { buildBuildingsLayer } from './mvt/layer.js';
import { encodePbf } from './pbf/encode.js';

export interface EncodeTileOptions extends TileOptions {
  /** Shares clip bounds across calls; computed per call when omitted. */
  boundsCache?: TileBoundsCache;
  /** See {@link LayerSettings.onDropped}. */
  onDropped?: (building: Building, err: unknown) => void;
}

/**
 * Encode buildings as an MVT 2.1 tile with one layer.
 *
 * An empty `buildings` array still yields a valid tile holding one empty
 * layer.
 */
export function encodeTile(
  buildings: readonly Building[],
  tile: TileAddress,
  options?: EncodeTileOptions,
): Uint8Array {
  const { layerName, extent, buffer } = resolveTileOptions(options);
  const { z, x, y } = tile;
  const clip = options?.boundsCache
    ? options.boundsCache.getClip(z, x, y, buffer, extent)
    : tileClipBounds(z, x, y, buffer, extent);

  const layer = buildBuildingsLayer(buildings, tile, clip, {
    name: layerName,
    extent,
    onDropped: options?.onDropped,
  });
  return encodePbf([layer]);
}

/** The tile served when there is nothing to draw. */
export function emptyTile(options?: TileOptions): Uint8Array {
  const { layerName, extent } = resolveTileOptions(options);
  return encodePbf([{ name: layerName, extent, features: [], keys: [], values: [] }]);
}
