/**
 * @module footprint-tiles
 *
 * Public API surface.
 *
 * footprint-tiles serves building footprints from an indexed FlatGeobuf
 * file as Mapbox Vector Tiles, computed per request, and reports count and
 * area of the buildings in the map's current viewport.
 *
 * ---
 *
 * ### Layers
 *
 * | Layer | Export | Role |
 * |-------|--------|------|
 * | **Store** | {@link StorePool} / {@link SpatialStoreHandle} | Bbox queries and aggregates over the dataset, one file handle per concurrent caller. |
 * | **Encoder** | {@link encodeTile} | Buildings → MVT bytes. Pure. |
 * | **Service** | {@link TileService} | Zoom policy, deadlines, degraded outcomes. |
 * | **View** | {@link ViewStateRegister} / {@link ViewStatsMonitor} | Last viewport and memoized stats for it. |
 * | **HTTP** | {@link buildApp} | Fastify routes over a service. |
 */

// ─── Store ──────────────────────────────────────────────────────────────────

export { openDataset } from './store/dataset.js';
export { SpatialStoreHandle } from './store/handle.js';
export { StorePool } from './store/pool.js';
export { LocalConnector } from './connectors/local.js';

// ─── Encoding ───────────────────────────────────────────────────────────────

export { encodeTile, emptyTile } from './tile.js';
export { tileBBox, tileClipBounds, isValidTile, TileBoundsCache } from './tiles.js';
export { resolveTileOptions, DEFAULT_TILE_OPTIONS } from './options.js';

// ─── Service & view ─────────────────────────────────────────────────────────

export { TileService } from './service.js';
export { ViewStateRegister } from './view/register.js';
export { ViewStatsMonitor, viewKey } from './stats/monitor.js';
export { registerViewSource, httpViewSource } from './stats/sources.js';
export { buildApp } from './http/app.js';
export { loadConfig } from './config.js';
export { createLogger } from './logger.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export { DatasetError, FgbFormatError, QueryAbortedError, ConfigError } from './errors.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { Connector } from './connectors/connector.js';
export type { Dataset } from './store/dataset.js';
export type { SpatialStore, StoreAccess } from './store/handle.js';
export type { StorePoolOptions } from './store/pool.js';
export type { TileOptions } from './options.js';
export type { EncodeTileOptions } from './tile.js';
export type { TileOutcome, TileServiceOptions } from './service.js';
export type { ViewSource, StatsSnapshot, KeyPrecision, ViewStatsMonitorOptions } from './stats/monitor.js';
export type { HttpViewSourceOptions } from './stats/sources.js';
export type { BuildAppOptions, HttpSettings } from './http/app.js';
export type { AppConfig } from './config.js';
export type { BBox, Building, TileAddress, ViewBounds, ViewState, AggregateStats } from './types.js';
