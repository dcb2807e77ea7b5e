/**
 * Binance Spot REST Client
 *
 * Fetches the latest spot price for a single symbol from the public ticker
 * endpoint. Every failure (timeout, HTTP status, malformed payload) surfaces
 * as a TRANSIENT_FETCH TraderError so the feed can degrade to staleness.
 *
 * @see https://binance-docs.github.io/apidocs/spot/en/#symbol-price-ticker
 */

import type { SpotPrice } from '../types/market.types.js';
import { isRecord } from '../utils/json-guards.js';
import { TraderError, TraderErrorCode, getErrorMessage } from '../utils/trader-error.js';

// ============================================================================
// Types
// ============================================================================

export interface BinanceSpotConfig {
  /** Symbol to quote (e.g., 'BTCUSDT') */
  symbol: string;
  /** REST base URL (default: https://api.binance.com) */
  baseUrl?: string;
  /** Request timeout in ms (default: 3000) */
  timeoutMs?: number;
  /** Fetch implementation (default: global fetch) */
  fetchImpl?: typeof fetch;
}

/**
 * Anything that can produce a spot price on request
 */
export interface SpotPriceSource {
  getPrice(): Promise<SpotPrice>;
}

interface TickerPriceResponse {
  symbol: string;
  price: string;
}

// ============================================================================
// BinanceSpotClient Implementation
// ============================================================================

export class BinanceSpotClient implements SpotPriceSource {
  private readonly symbol: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: BinanceSpotConfig) {
    const symbol = config.symbol.toUpperCase();
    if (!/^[A-Z0-9]+$/.test(symbol)) {
      throw new Error(`Invalid symbol format: ${config.symbol}. Only alphanumeric characters allowed.`);
    }

    this.symbol = symbol;
    const baseUrl = (config.baseUrl ?? 'https://api.binance.com').replace(/\/+$/, '');
    this.url = `${baseUrl}/api/v3/ticker/price?symbol=${symbol}`;
    this.timeoutMs = config.timeoutMs ?? 3000;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async getPrice(): Promise<SpotPrice> {
    let body: unknown;
    try {
      const response = await this.fetchImpl(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw new TraderError(
        `Binance ticker request failed: ${getErrorMessage(error)}`,
        TraderErrorCode.TRANSIENT_FETCH,
        error
      );
    }

    if (!isTickerPriceResponse(body)) {
      throw new TraderError('Binance ticker response is malformed', TraderErrorCode.TRANSIENT_FETCH);
    }

    const price = parseFloat(body.price);
    if (!Number.isFinite(price) || price <= 0) {
      throw new TraderError(`Invalid price value: ${body.price}`, TraderErrorCode.TRANSIENT_FETCH);
    }

    return {
      symbol: this.symbol.toLowerCase(),
      price,
      timestamp: Date.now(),
    };
  }

  getSymbol(): string {
    return this.symbol;
  }
}

function isTickerPriceResponse(value: unknown): value is TickerPriceResponse {
  return isRecord(value) && typeof value.symbol === 'string' && typeof value.price === 'string';
}
