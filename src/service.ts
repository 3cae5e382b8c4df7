/**
 * @module service
 *
 * The tile service: zoom policy, store access under a deadline, encoding,
 * and the view register, behind one object the HTTP layer talks to.
 *
 * {@link TileService.renderTile} never throws. Every outcome carries a
 * valid tile; failures and timeouts are reported in the outcome and in the
 * log, and the client gets an empty tile it can render.
 *
 * @example
 * ```typescript
 * const service = new TileService({ store: pool, register, logger, options: { minZoom: 12 } });
 * const outcome = await service.renderTile(14, 8424, 5405);
 * if (outcome.status === 'degraded') console.warn(outcome.error);
 * ```
 */

import type { Logger } from 'pino';
import type { StoreAccess } from './store/handle.js';
import type { ViewStateRegister } from './view/register.js';
import type { StatsSnapshot, ViewStatsMonitor } from './stats/monitor.js';
import type { ViewBounds, ViewState } from './types.js';
import type { TileOptions } from './options.js';
import { resolveTileOptions } from './options.js';
import { TileBoundsCache, isValidTile } from './tiles.js';
import { encodeTile, emptyTile } from './tile.js';
import { withDeadline } from './abort.js';
import { toError } from './errors.js';

/** How a tile request ended. */
export type TileOutcome =
  /** Rendered from the store; `features` buildings were read. */
  | { status: 'ok'; tile: Uint8Array; features: number }
  /** Outside the served zoom range; the store was not touched. */
  | { status: 'skipped'; tile: Uint8Array }
  /** The store or the encoder failed, or the deadline passed. */
  | { status: 'degraded'; tile: Uint8Array; error: Error };

export interface TileServiceOptions {
  store: StoreAccess;
  register: ViewStateRegister;
  monitor?: ViewStatsMonitor;
  logger: Logger;
  options?: TileOptions;
  /** Deadline per tile request. @defaultValue 5000 */
  timeoutMs?: number;
}

export class TileService {
  readonly options: Required<TileOptions>;
  readonly timeoutMs: number;
  private readonly store: StoreAccess;
  private readonly register: ViewStateRegister;
  private readonly monitor: ViewStatsMonitor | undefined;
  private readonly logger: Logger;
  private readonly boundsCache = new TileBoundsCache();
  private readonly empty: Uint8Array;

  constructor(opts: TileServiceOptions) {
    this.store = opts.store;
    this.register = opts.register;
    this.monitor = opts.monitor;
    this.logger = opts.logger;
    this.options = resolveTileOptions(opts.options);
    this.timeoutMs = opts.timeoutMs ?? 5000;
    this.empty = emptyTile(this.options);
  }

  /**
   * Render tile z/x/y.
   *
   * @param signal - Aborts the store query, e.g. when the client goes away.
   */
  async renderTile(z: number, x: number, y: number, signal?: AbortSignal): Promise<TileOutcome> {
    const { minZoom, maxZoom } = this.options;
    if (z < minZoom || z > maxZoom) {
      return { status: 'skipped', tile: this.empty };
    }
    if (!isValidTile(z, x, y, maxZoom)) {
      return this.degraded(z, x, y, new RangeError(`Invalid tile ${z}/${x}/${y}`), signal);
    }

    const started = performance.now();
    try {
      const bbox = this.boundsCache.getWgs84(z, x, y);
      const buildings = await withDeadline(this.timeoutMs, signal, (sig) =>
        this.store.withHandle((store) => store.queryInBBox(bbox, sig), sig),
      );

      const tile = encodeTile(buildings, { z, x, y }, {
        ...this.options,
        boundsCache: this.boundsCache,
        onDropped: (building, err) => {
          this.logger.warn({ err, id: building.id, z, x, y }, 'Building dropped from tile');
        },
      });

      const ms = Math.round(performance.now() - started);
      const fields = { z, x, y, features: buildings.length, bytes: tile.length, ms };
      if (ms > this.timeoutMs / 2) {
        this.logger.warn(fields, 'Slow tile');
      } else {
        this.logger.debug(fields, 'Tile rendered');
      }
      return { status: 'ok', tile, features: buildings.length };
    } catch (err) {
      return this.degraded(z, x, y, toError(err), signal);
    }
  }

  /** Record the latest map viewport. */
  updateView(bounds: ViewBounds, zoom: number | null): ViewState {
    return this.register.setView(bounds, zoom);
  }

  currentView(): ViewState | null {
    return this.register.getView();
  }

  /** The stats monitor's latest snapshot, or `null` when none is attached. */
  stats(): StatsSnapshot | null {
    return this.monitor ? this.monitor.current() : null;
  }

  private degraded(z: number, x: number, y: number, error: Error, signal?: AbortSignal): TileOutcome {
    if (signal?.aborted) {
      this.logger.debug({ z, x, y }, 'Tile request cancelled');
    } else {
      this.logger.error({ err: error, z, x, y }, 'Serving empty tile after failure');
    }
    return { status: 'degraded', tile: this.empty, error };
  }
}
