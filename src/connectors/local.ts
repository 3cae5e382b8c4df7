/**
 * @module connectors/local
 *
 * Local filesystem {@link Connector}.
 *
 * Opens each path once, on first read, and keeps the descriptor until
 * {@link LocalConnector.close}. A store handle owns one connector, which
 * gives it a private descriptor for the dataset file.
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Connector } from './connector.js';

/**
 * Largest length passed to a single `FileHandle.read()`; Node rejects
 * lengths that do not fit an Int32.
 */
const MAX_READ_CHUNK = 1024 * 1024 * 1024;

/**
 * @example
 * ```typescript
 * const connector = new LocalConnector();
 * const magic = await connector.read('./data/buildings.fgb', 0, 8);
 * await connector.close();
 * ```
 */
export class LocalConnector implements Connector {
  /**
   * Pending or settled opens. Concurrent first reads of a path share one
   * open, so a path never holds more than one descriptor.
   */
  private readonly handles = new Map<string, Promise<FileHandle>>();
  private closed = false;

  async read(path: string, offset: number, length: number): Promise<Uint8Array> {
    const handle = await this.getHandle(path);
    const buf = Buffer.alloc(length);

    let totalRead = 0;
    while (totalRead < length) {
      const chunk = Math.min(length - totalRead, MAX_READ_CHUNK);
      const { bytesRead } = await handle.read(buf, totalRead, chunk, offset + totalRead);
      totalRead += bytesRead;
      if (bytesRead < chunk) break; // EOF
    }

    return new Uint8Array(buf.buffer, buf.byteOffset, totalRead);
  }

  async readRanges(
    path: string,
    ranges: ReadonlyArray<{ offset: number; length: number }>,
  ): Promise<Uint8Array[]> {
    return Promise.all(ranges.map(({ offset, length }) => this.read(path, offset, length)));
  }

  /** Close every descriptor, including opens still in flight. */
  async close(): Promise<void> {
    this.closed = true;
    const pending = [...this.handles.values()];
    this.handles.clear();

    const opened = await Promise.allSettled(pending);
    await Promise.all(
      opened.map((result) => (result.status === 'fulfilled' ? result.value.close() : undefined)),
    );
  }

  private getHandle(path: string): Promise<FileHandle> {
    if (this.closed) return Promise.reject(new Error(`Connector closed: ${path}`));

    let handle = this.handles.get(path);
    if (handle === undefined) {
      handle = open(path, 'r');
      this.handles.set(path, handle);
      // A failed open is forgotten so the next read tries again.
      const opening = handle;
      void opening.catch(() => {
        if (this.handles.get(path) === opening) this.handles.delete(path);
      });
    }
    return handle;
  }
}
