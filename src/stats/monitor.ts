/**
 * @module stats/monitor
 *
 * Memoized building stats for the current viewport.
 *
 * The monitor polls a {@link ViewSource} and recomputes count and area only
 * when the view changed. "Changed" is decided on a key built from the
 * bounds and zoom rounded to a fixed precision, so sub-pixel pans reuse
 * the previous result.
 */

import type { Logger } from 'pino';
import type { StoreAccess } from '../store/handle.js';
import type { AggregateStats, BBox, ViewState } from '../types.js';
import { withDeadline } from '../abort.js';

/** Where the monitor reads the current view from. */
export interface ViewSource {
  /** The current view, or `null` when none is known. Should not reject. */
  read(): Promise<ViewState | null>;
}

export interface KeyPrecision {
  /** Decimals kept for north/south/east/west. @defaultValue 4 */
  positionPrecision?: number;
  /** Decimals kept for zoom. @defaultValue 1 */
  zoomPrecision?: number;
}

/** Result of the last completed poll. */
export interface StatsSnapshot extends AggregateStats {
  view: ViewState | null;
  key: string | null;
  /** Epoch milliseconds of the computation. */
  computedAt: number;
}

export interface ViewStatsMonitorOptions extends KeyPrecision {
  source: ViewSource;
  store: StoreAccess;
  logger: Logger;
  /** Deadline for one aggregate query. @defaultValue 5000 */
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Memoization key of a view, or `null` for no view.
 *
 * A missing zoom counts as zoom 0.
 *
 * @example
 * ```ts
 * viewKey(view, { positionPrecision: 2, zoomPrecision: 0 });
 * // north 52.1234, south 52.0001, east 5.2, west 5.0, zoom 14.6
 * // => '52.12,52,5.2,5,15'
 * ```
 */
export function viewKey(view: ViewState | null, precision?: KeyPrecision): string | null {
  if (view === null) return null;
  const p = precision?.positionPrecision ?? 4;
  const zp = precision?.zoomPrecision ?? 1;
  const { north, south, east, west } = view.bounds;
  return [
    round(north, p),
    round(south, p),
    round(east, p),
    round(west, p),
    round(view.zoom ?? 0, zp),
  ].join(',');
}

function round(value: number, decimals: number): string {
  const factor = 10 ** decimals;
  // String(-0) is '0', so keys never differ by the sign of zero.
  return String(Math.round(value * factor) / factor);
}

/** Map viewport bounds to a query box in WGS84. */
export function viewBBox(view: ViewState): BBox {
  const { north, south, east, west } = view.bounds;
  return { minX: west, minY: south, maxX: east, maxY: north };
}

/**
 * @example
 * ```typescript
 * const monitor = new ViewStatsMonitor({ source: registerViewSource(register), store: pool, logger });
 * monitor.start(1500);
 * // ...
 * monitor.current(); // latest snapshot
 * monitor.stop();
 * ```
 */
export class ViewStatsMonitor {
  private readonly source: ViewSource;
  private readonly store: StoreAccess;
  private readonly logger: Logger;
  private readonly precision: Required<KeyPrecision>;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  private snapshot: StatsSnapshot;
  /** Key of the last successful computation; `undefined` before the first. */
  private lastKey: string | null | undefined = undefined;
  private inflight: { key: string | null; promise: Promise<StatsSnapshot> } | null = null;
  private timer: NodeJS.Timeout | null = null;
  private recomputes = 0;
  /** Incremented per computation; only the newest one may publish. */
  private generation = 0;

  constructor(options: ViewStatsMonitorOptions) {
    this.source = options.source;
    this.store = options.store;
    this.logger = options.logger;
    this.precision = {
      positionPrecision: options.positionPrecision ?? 4,
      zoomPrecision: options.zoomPrecision ?? 1,
    };
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
    this.snapshot = this.zeros(null, null);
  }

  /** The latest snapshot; zeros before the first completed poll. */
  current(): StatsSnapshot {
    return this.snapshot;
  }

  /** Number of aggregate queries issued so far. */
  get recomputeCount(): number {
    return this.recomputes;
  }

  /**
   * Read the view and return stats for it, recomputing only when its key
   * differs from the last one. Never rejects.
   */
  async poll(): Promise<StatsSnapshot> {
    const view = await this.readView();
    const key = viewKey(view, this.precision);

    if (key === this.lastKey) return this.snapshot;
    if (this.inflight !== null && this.inflight.key === key) return this.inflight.promise;

    const promise = this.compute(view, key, ++this.generation);
    this.inflight = { key, promise };
    try {
      return await promise;
    } finally {
      if (this.inflight?.promise === promise) this.inflight = null;
    }
  }

  /** Poll every `intervalMs` until {@link stop}. Polls immediately. */
  start(intervalMs: number = 1500): void {
    if (this.timer !== null) return;
    void this.poll();
    this.timer = setInterval(() => {
      void this.poll();
    }, intervalMs);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private async readView(): Promise<ViewState | null> {
    try {
      return await this.source.read();
    } catch (err) {
      this.logger.warn({ err }, 'Reading the current view failed');
      return null;
    }
  }

  private async compute(view: ViewState | null, key: string | null, gen: number): Promise<StatsSnapshot> {
    if (view === null) {
      return this.publish(this.zeros(null, null), gen, true);
    }

    this.recomputes++;
    const started = this.now();
    try {
      const stats = await withDeadline(this.timeoutMs, undefined, (signal) =>
        this.store.withHandle((store) => store.aggregateInBBox(viewBBox(view), signal), signal),
      );
      const snapshot: StatsSnapshot = { ...stats, view, key, computedAt: this.now() };
      this.logger.info(
        { key, count: stats.count, area: stats.area, ms: snapshot.computedAt - started },
        'View stats updated',
      );
      return this.publish(snapshot, gen, true);
    } catch (err) {
      this.logger.error({ err, key }, 'View stats query failed');
      // Not memoized: the same view is retried on the next poll.
      return this.publish(this.zeros(view, key), gen, false);
    }
  }

  private publish(snapshot: StatsSnapshot, gen: number, memoize: boolean): StatsSnapshot {
    if (gen !== this.generation) return snapshot;
    this.snapshot = snapshot;
    this.lastKey = memoize ? snapshot.key : undefined;
    return snapshot;
  }

  private zeros(view: ViewState | null, key: string | null): StatsSnapshot {
    return { count: 0, area: 0, view, key, computedAt: this.now() };
  }
}
