/**
 * @module config
 *
 * Process configuration from environment variables.
 *
 * | Variable                   | Default                  |
 * | -------------------------- | ------------------------ |
 * | `HOST` / `PORT`            | `127.0.0.1` / `8080`     |
 * | `DATASET_PATH`             | `./data/buildings.fgb`   |
 * | `LAYER_NAME`               | `buildings`              |
 * | `MIN_ZOOM` / `MAX_ZOOM`    | `10` / `22`              |
 * | `TILE_EXTENT` / `TILE_BUFFER` | `4096` / `64`         |
 * | `STORE_POOL_SIZE`          | `4`                      |
 * | `REQUEST_TIMEOUT_MS`       | `5000`                   |
 * | `TILE_CACHE_MAX_AGE`       | `3600`                   |
 * | `STATS_POLL_MS`            | `1500`                   |
 * | `STATS_POSITION_PRECISION` | `4`                      |
 * | `STATS_ZOOM_PRECISION`     | `1`                      |
 * | `CORS_ORIGIN`              | `*`                      |
 * | `LOG_LEVEL`                | `info`                   |
 * | `VIEW_SERVER_URL`          | `http://127.0.0.1:8080`  |
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { TileOptions } from './options.js';
import { DEFAULT_TILE_OPTIONS } from './options.js';
import { MAX_SUPPORTED_ZOOM } from './tiles.js';

const int = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z
  .object({
    HOST: z.string().min(1).default('127.0.0.1'),
    PORT: int(0, 65535, 8080),
    DATASET_PATH: z.string().min(1).default('./data/buildings.fgb'),
    LAYER_NAME: z.string().regex(/^[A-Za-z0-9_-]+$/).default(DEFAULT_TILE_OPTIONS.layerName),
    MIN_ZOOM: int(0, MAX_SUPPORTED_ZOOM, DEFAULT_TILE_OPTIONS.minZoom),
    MAX_ZOOM: int(0, MAX_SUPPORTED_ZOOM, DEFAULT_TILE_OPTIONS.maxZoom),
    TILE_EXTENT: int(256, 65536, DEFAULT_TILE_OPTIONS.extent),
    TILE_BUFFER: int(0, 4096, DEFAULT_TILE_OPTIONS.buffer),
    STORE_POOL_SIZE: int(1, 64, 4),
    REQUEST_TIMEOUT_MS: int(1, 600_000, 5000),
    TILE_CACHE_MAX_AGE: int(0, 31_536_000, 3600),
    STATS_POLL_MS: int(100, 3_600_000, 1500),
    STATS_POSITION_PRECISION: int(0, 10, 4),
    STATS_ZOOM_PRECISION: int(0, 5, 1),
    CORS_ORIGIN: z.string().min(1).default('*'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    VIEW_SERVER_URL: z.string().url().default('http://127.0.0.1:8080'),
  })
  .refine((env) => env.MIN_ZOOM <= env.MAX_ZOOM, {
    message: 'MIN_ZOOM must not exceed MAX_ZOOM',
    path: ['MIN_ZOOM'],
  });

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface AppConfig {
  host: string;
  port: number;
  datasetPath: string;
  tile: Required<TileOptions>;
  poolSize: number;
  requestTimeoutMs: number;
  cacheMaxAge: number;
  statsPollMs: number;
  positionPrecision: number;
  zoomPrecision: number;
  corsOrigin: string;
  logLevel: LogLevel;
  viewServerUrl: string;
}

/**
 * Validate and convert environment variables.
 *
 * Empty strings count as unset.
 *
 * @throws {ConfigError} Listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    datasetPath: e.DATASET_PATH,
    tile: {
      layerName: e.LAYER_NAME,
      extent: e.TILE_EXTENT,
      buffer: e.TILE_BUFFER,
      minZoom: e.MIN_ZOOM,
      maxZoom: e.MAX_ZOOM,
    },
    poolSize: e.STORE_POOL_SIZE,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    cacheMaxAge: e.TILE_CACHE_MAX_AGE,
    statsPollMs: e.STATS_POLL_MS,
    positionPrecision: e.STATS_POSITION_PRECISION,
    zoomPrecision: e.STATS_ZOOM_PRECISION,
    corsOrigin: e.CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    viewServerUrl: e.VIEW_SERVER_URL,
  };
}
