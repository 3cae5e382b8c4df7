/**
 * @module store/pool
 *
 * A fixed set of store handles shared by concurrent requests.
 *
 * Every handle owns its own file descriptor. `withHandle` lends one handle
 * to one caller at a time; callers that find all handles busy wait in FIFO
 * order. The dataset header and index are opened once and shared by all
 * handles.
 */

import { SpatialStoreHandle, type SpatialStore, type StoreAccess } from './handle.js';
import { openDataset, type Dataset } from './dataset.js';
import { abortReason, throwIfAborted } from '../errors.js';

export interface StorePoolOptions {
  /** Number of handles. @defaultValue 4 */
  size?: number;
}

interface Waiter {
  resolve: (handle: SpatialStoreHandle) => void;
  reject: (err: Error) => void;
}

/**
 * @example
 * ```typescript
 * const pool = await StorePool.open('./data/buildings.fgb', { size: 4 });
 * const buildings = await pool.withHandle((store) => store.queryInBBox(bbox));
 * await pool.close();
 * ```
 */
export class StorePool implements StoreAccess {
  readonly dataset: Dataset;
  private readonly handles: SpatialStoreHandle[];
  private readonly idle: SpatialStoreHandle[];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  private constructor(dataset: Dataset, size: number) {
    this.dataset = dataset;
    this.handles = Array.from({ length: size }, () => new SpatialStoreHandle(dataset));
    this.idle = [...this.handles];
  }

  /**
   * Open the dataset (unless already opened) and create the handles.
   *
   * @throws {DatasetError} See {@link openDataset}.
   */
  static async open(source: string | Dataset, options?: StorePoolOptions): Promise<StorePool> {
    const size = Math.max(1, Math.floor(options?.size ?? 4));
    const dataset = typeof source === 'string' ? await openDataset(source) : source;
    return new StorePool(dataset, size);
  }

  get size(): number {
    return this.handles.length;
  }

  /** Handles not lent out right now. */
  get available(): number {
    return this.idle.length;
  }

  /** Callers waiting for a handle. */
  get pending(): number {
    return this.waiters.length;
  }

  async withHandle<T>(fn: (store: SpatialStore) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const handle = await this.acquire(signal);
    try {
      return await fn(handle);
    } finally {
      this.release(handle);
    }
  }

  /**
   * Close every handle, including those lent out. Waiting callers are
   * rejected.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new Error('Store pool closed'));
    }
    await Promise.all(this.handles.map((h) => h.close()));
  }

  // ─── Lending ──────────────────────────────────────────────────────────

  private acquire(signal?: AbortSignal): Promise<SpatialStoreHandle> {
    if (this.closed) return Promise.reject(new Error('Store pool closed'));
    throwIfAborted(signal);

    const handle = this.idle.pop();
    if (handle !== undefined) return Promise.resolve(handle);

    return new Promise<SpatialStoreHandle>((resolve, reject) => {
      const onAbort = (): void => {
        const idx = this.waiters.indexOf(waiter);
        if (idx !== -1) this.waiters.splice(idx, 1);
        if (signal) reject(abortReason(signal));
      };
      const waiter: Waiter = {
        resolve: (h) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(h);
        },
        reject: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release(handle: SpatialStoreHandle): void {
    if (this.closed) return;
    const next = this.waiters.shift();
    if (next !== undefined) {
      next.resolve(handle);
    } else {
      this.idle.push(handle);
    }
  }
}
