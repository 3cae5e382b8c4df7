/**
 * @module logger
 *
 * The process-wide pino logger. Fastify receives the same instance as its
 * `loggerInstance`, so request logs and service logs share level and
 * output.
 */

import { pino, stdSerializers, type Logger } from 'pino';
import type { LogLevel } from './config.js';

export function createLogger(level: LogLevel = 'info', name: string = 'footprint-tiles'): Logger {
  return pino({
    name,
    level,
    serializers: { err: stdSerializers.err },
  });
}
