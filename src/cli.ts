#!/usr/bin/env node
/**
 * @module cli
 *
 * Server entry point. Configuration comes from the environment (see
 * {@link loadConfig}); the dataset is opened before the port is bound, so
 * a bad `DATASET_PATH` stops the process with exit code 1.
 */

import type { Logger } from 'pino';
import { loadConfig, type AppConfig } from './config.js';
import { createLogger } from './logger.js';
import { ConfigError, DatasetError } from './errors.js';
import { StorePool } from './store/pool.js';
import { ViewStateRegister } from './view/register.js';
import { ViewStatsMonitor } from './stats/monitor.js';
import { registerViewSource } from './stats/sources.js';
import { TileService } from './service.js';
import { buildApp } from './http/app.js';

async function main(): Promise<void> {
  let logger: Logger = createLogger();
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
  logger = createLogger(config.logLevel);

  let pool: StorePool;
  try {
    pool = await StorePool.open(config.datasetPath, { size: config.poolSize });
  } catch (err) {
    if (err instanceof DatasetError) {
      logger.fatal({ err }, 'Cannot open dataset');
      process.exitCode = 1;
      return;
    }
    throw err;
  }
  logger.info(
    { path: config.datasetPath, features: pool.dataset.header.featuresCount, handles: pool.size },
    'Dataset opened',
  );

  const register = new ViewStateRegister();
  const monitor = new ViewStatsMonitor({
    source: registerViewSource(register),
    store: pool,
    logger: logger.child({ component: 'stats' }),
    positionPrecision: config.positionPrecision,
    zoomPrecision: config.zoomPrecision,
    timeoutMs: config.requestTimeoutMs,
  });
  const service = new TileService({
    store: pool,
    register,
    monitor,
    logger: logger.child({ component: 'tiles' }),
    options: config.tile,
    timeoutMs: config.requestTimeoutMs,
  });

  const app = await buildApp({
    service,
    logger,
    settings: { cacheMaxAge: config.cacheMaxAge, corsOrigin: config.corsOrigin },
  });

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    monitor.stop();
    try {
      await app.close();
      await pool.close();
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exitCode = 1;
    }
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, (sig) => {
      void shutdown(sig);
    });
  }

  await app.listen({ host: config.host, port: config.port });
  monitor.start(config.statsPollMs);
}

main().catch((err: unknown) => {
  createLogger().fatal({ err }, 'Startup failed');
  process.exitCode = 1;
});
