/**
 * Reference Price Feed
 *
 * Polls the spot-price source on a fixed interval and keeps the latest quote
 * in a single-writer cache shared by every series. A failed poll never fails
 * a tick: readers keep the previous quote with growing staleness until it
 * crosses `maxStalenessMs`, after which the feed reports `unavailable`.
 */

import type { Quote, ReferenceReading } from '../types/market.types.js';
import type { SpotPriceSource } from '../clients/binance-spot-client.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { getErrorMessage, isTraderError } from '../utils/trader-error.js';

// ============================================================================
// Types
// ============================================================================

export interface ReferencePriceFeedConfig {
  /** Poll interval (ms) */
  pollIntervalMs: number;
  /** Quote age beyond which the feed is unavailable (ms) */
  maxStalenessMs: number;
  /** Symbol used in logs */
  symbol?: string;
  /** Clock (default: Date.now) */
  now?: () => number;
  logger?: IStrategyLogger;
}

// ============================================================================
// ReferencePriceFeed Implementation
// ============================================================================

export class ReferencePriceFeed {
  private readonly pollIntervalMs: number;
  private readonly maxStalenessMs: number;
  private readonly symbol: string | undefined;
  private readonly now: () => number;
  private readonly logger: IStrategyLogger;
  private readonly createdAt: number;

  private quote: Quote | null = null;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<ReferenceReading> | null = null;
  private reportedUnavailable = false;

  constructor(
    private readonly source: SpotPriceSource,
    config: ReferencePriceFeedConfig
  ) {
    this.pollIntervalMs = config.pollIntervalMs;
    this.maxStalenessMs = config.maxStalenessMs;
    this.symbol = config.symbol;
    this.now = config.now ?? (() => Date.now());
    this.logger = config.logger ?? silentLogger;
    this.createdAt = this.now();
  }

  /**
   * Fetch once and return the resulting reading. Overlapping calls share
   * the in-flight request.
   */
  poll(): Promise<ReferenceReading> {
    if (!this.inFlight) {
      this.inFlight = this.fetchOnce().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Latest reading without touching the network
   */
  latest(now: number = this.now()): ReferenceReading {
    if (!this.quote) {
      return { kind: 'unavailable', stalenessMs: null, since: this.createdAt };
    }

    const stalenessMs = Math.max(0, now - this.quote.observedAt);
    if (stalenessMs > this.maxStalenessMs) {
      return {
        kind: 'unavailable',
        stalenessMs,
        since: this.quote.observedAt + this.maxStalenessMs,
      };
    }
    return { kind: 'quote', quote: this.quote, stalenessMs };
  }

  /**
   * Start of the current outage, or null while a usable quote exists
   */
  unavailableSince(now: number = this.now()): number | null {
    const reading = this.latest(now);
    return reading.kind === 'unavailable' ? reading.since : null;
  }

  /**
   * Poll immediately, then on every interval
   */
  start(): void {
    if (this.timer) {
      return;
    }
    const tick = (): void => {
      this.poll().catch((error: unknown) => {
        this.logger.error(LogEvents.ERROR, { symbol: this.symbol, error: getErrorMessage(error) });
      });
    };
    tick();
    this.timer = setInterval(tick, this.pollIntervalMs);
  }

  /**
   * Stop polling and wait for an in-flight request
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async fetchOnce(): Promise<ReferenceReading> {
    try {
      const spot = await this.source.getPrice();
      this.quote = { source: 'reference', value: spot.price, observedAt: this.now() };
      this.reportedUnavailable = false;
    } catch (error) {
      this.logger.warn(LogEvents.REFERENCE_FETCH_FAILED, {
        symbol: this.symbol,
        error: getErrorMessage(error),
        errorCode: isTraderError(error) ? error.code : undefined,
      });
    }

    const reading = this.latest();
    if (reading.kind === 'unavailable' && !this.reportedUnavailable) {
      this.reportedUnavailable = true;
      this.logger.warn(LogEvents.REFERENCE_UNAVAILABLE, {
        symbol: this.symbol,
        stalenessMs: reading.stalenessMs ?? undefined,
      });
    }
    return reading;
  }
}
