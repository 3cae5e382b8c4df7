/**
 * @module stats/sources
 *
 * {@link ViewSource} implementations: the in-process register, and a
 * running server's `GET /get-bounds` for a stats process of its own.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import type { ViewSource } from './monitor.js';
import type { ViewStateRegister } from '../view/register.js';
import type { ViewState } from '../types.js';
import { withDeadline } from '../abort.js';

/** Read the view straight from a register in the same process. */
export function registerViewSource(register: ViewStateRegister): ViewSource {
  return {
    read: () => Promise.resolve(register.getView()),
  };
}

/** Body of `GET /get-bounds`. */
export const getBoundsResponseSchema = z.object({
  bounds: z
    .object({
      north: z.number(),
      south: z.number(),
      east: z.number(),
      west: z.number(),
      zoom: z.number().nullable(),
    })
    .nullable(),
});

export interface HttpViewSourceOptions {
  /** Deadline per request. @defaultValue 1000 */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Poll a tile server for its current view.
 *
 * Any failure (unreachable server, non-2xx status, unexpected body,
 * timeout) reads as "no view".
 *
 * @param baseUrl - Server origin, e.g. `http://127.0.0.1:8080`.
 */
export function httpViewSource(baseUrl: string, options?: HttpViewSourceOptions): ViewSource {
  const url = new URL('/get-bounds', baseUrl).toString();
  const timeoutMs = options?.timeoutMs ?? 1000;
  const now = options?.now ?? Date.now;

  return {
    async read(): Promise<ViewState | null> {
      try {
        const body = await withDeadline(timeoutMs, undefined, async (signal): Promise<unknown> => {
          const res = await fetch(url, { signal });
          if (!res.ok) throw new Error(`GET ${url} answered ${res.status}`);
          return res.json();
        });
        const { bounds } = getBoundsResponseSchema.parse(body);
        if (bounds === null) return null;

        const { zoom, ...rest } = bounds;
        return Object.freeze({ bounds: Object.freeze(rest), zoom, updatedAt: now() });
      } catch (err) {
        options?.logger?.debug({ err, url }, 'View server poll failed');
        return null;
      }
    },
  };
}
