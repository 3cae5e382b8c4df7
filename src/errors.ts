/**
 * @module errors
 *
 * Error classes raised by the dataset, store and configuration layers.
 *
 * Tile generation never lets these escape to HTTP clients; it converts them
 * into a degraded outcome (see {@link TileService.renderTile}). They remain
 * distinct classes so that logs and the startup path can tell a fatal
 * dataset problem from a per-request timeout.
 */

/** The dataset is missing, unreadable or not usable at startup. */
export class DatasetError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = 'DatasetError';
    this.path = path;
  }
}

/** Bytes that should hold FlatGeobuf data do not. */
export class FgbFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FgbFormatError';
  }
}

/** A query was cancelled or ran past its deadline. */
export class QueryAbortedError extends Error {
  constructor(message: string = 'Query aborted') {
    super(message);
    this.name = 'QueryAbortedError';
  }
}

/** The environment holds an invalid setting. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Throw if `signal` has been aborted.
 *
 * The abort reason is rethrown when it is an `Error`; otherwise a
 * {@link QueryAbortedError} stands in for it.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  throw abortReason(signal);
}

/** The error to report for an aborted signal. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new QueryAbortedError();
}

/** Normalize a caught value to an `Error`. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
