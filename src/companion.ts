#!/usr/bin/env node
/**
 * @module companion
 *
 * Stand-alone stats process. Polls a running tile server for the viewport
 * its map last reported, computes count and area from its own store pool,
 * and logs them whenever the rounded view changes.
 *
 * Reads the same environment as the server; `VIEW_SERVER_URL` names the
 * server to poll.
 */

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { StorePool } from './store/pool.js';
import { ViewStatsMonitor } from './stats/monitor.js';
import { httpViewSource } from './stats/sources.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, 'footprint-tiles-stats');

  // One handle: the companion runs a single aggregate at a time.
  const pool = await StorePool.open(config.datasetPath, { size: 1 });
  const monitor = new ViewStatsMonitor({
    source: httpViewSource(config.viewServerUrl, { logger }),
    store: pool,
    logger,
    positionPrecision: config.positionPrecision,
    zoomPrecision: config.zoomPrecision,
    timeoutMs: config.requestTimeoutMs,
  });

  logger.info({ server: config.viewServerUrl, everyMs: config.statsPollMs }, 'Watching view');
  monitor.start(config.statsPollMs);

  const shutdown = (): void => {
    monitor.stop();
    pool.close().catch((err: unknown) => {
      logger.error({ err }, 'Closing the store failed');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  createLogger().fatal({ err }, 'Startup failed');
  process.exitCode = 1;
});
