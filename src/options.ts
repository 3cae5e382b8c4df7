/**
 * @module options
 *
 * Tile encoding options and their resolution.
 *
 * Values cascade through three levels:
 *
 * 1. per-call overrides (highest priority)
 * 2. service-level settings, normally taken from {@link AppConfig}
 * 3. {@link DEFAULT_TILE_OPTIONS}
 *
 * @example
 * ```typescript
 * const opts = resolveTileOptions({ buffer: 16 }, { minZoom: 12 });
 * // → { layerName: 'buildings', extent: 4096, buffer: 16, minZoom: 12, maxZoom: 22 }
 * ```
 */

/** Encoder and zoom-policy settings. */
export interface TileOptions {
  /** Name of the single MVT layer. @defaultValue 'buildings' */
  layerName?: string;
  /** Tile coordinate extent. @defaultValue 4096 */
  extent?: number;
  /** Clip buffer around the tile, in tile units. @defaultValue 64 */
  buffer?: number;
  /**
   * Tiles below this zoom are served empty without touching the store.
   * @defaultValue 10
   */
  minZoom?: number;
  /** Highest zoom that is served at all. @defaultValue 22 */
  maxZoom?: number;
}

export const DEFAULT_TILE_OPTIONS: Readonly<Required<TileOptions>> = Object.freeze({
  layerName: 'buildings',
  extent: 4096,
  buffer: 64,
  minZoom: 10,
  maxZoom: 22,
});

/**
 * Resolve effective options: overrides → service settings → defaults.
 */
export function resolveTileOptions(
  overrides?: TileOptions,
  service?: TileOptions,
): Required<TileOptions> {
  return {
    layerName: overrides?.layerName ?? service?.layerName ?? DEFAULT_TILE_OPTIONS.layerName,
    extent: overrides?.extent ?? service?.extent ?? DEFAULT_TILE_OPTIONS.extent,
    buffer: overrides?.buffer ?? service?.buffer ?? DEFAULT_TILE_OPTIONS.buffer,
    minZoom: overrides?.minZoom ?? service?.minZoom ?? DEFAULT_TILE_OPTIONS.minZoom,
    maxZoom: overrides?.maxZoom ?? service?.maxZoom ?? DEFAULT_TILE_OPTIONS.maxZoom,
  };
}
