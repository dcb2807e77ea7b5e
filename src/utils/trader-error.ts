/**
 * Trader Error
 *
 * Typed error for pipeline operations. Callers branch on `code` to decide
 * whether a failure skips a tick, degrades a feed, or aborts startup.
 */

/** Error codes for TraderError */
export enum TraderErrorCode {
  /** Contract metadata lacks a strike, expiry or YES token */
  METADATA_INCOMPLETE = 'METADATA_INCOMPLETE',
  /** No live contract could be resolved for a series */
  CONTRACT_NOT_FOUND = 'CONTRACT_NOT_FOUND',
  /** Reference price is older than the staleness bound */
  FEED_UNAVAILABLE = 'FEED_UNAVAILABLE',
  /** Outcome price stream has no live subscription */
  STREAM_DISCONNECTED = 'STREAM_DISCONNECTED',
  /** Timeout, HTTP failure or malformed payload from an upstream source */
  TRANSIENT_FETCH = 'TRANSIENT_FETCH',
  /** A price outside the tradeable range reached execution */
  INVALID_PRICE = 'INVALID_PRICE',
  /** Startup configuration is missing or invalid */
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class TraderError extends Error {
  constructor(
    message: string,
    public readonly code: TraderErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TraderError';
  }
}

export function isTraderError(error: unknown, code?: TraderErrorCode): error is TraderError {
  return error instanceof TraderError && (code === undefined || error.code === code);
}

/**
 * Safely extract error message from unknown caught value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
