/**
 * Gamma Markets Client
 *
 * Market discovery over Polymarket's Gamma REST API. Lists active markets
 * and normalizes each into a DiscoveredMarket: slug, window bounds, outcome
 * tokens with prices, and the raw metadata the resolver needs to derive a
 * strike.
 *
 * Gamma quirks handled here:
 * - `outcomes`, `outcomePrices` and `clobTokenIds` arrive as JSON strings
 * - binary crypto markets label outcomes Yes/No or Up/Down
 */

import { isRecord, readArray, readBoolean, readNumber, readString } from '../utils/json-guards.js';
import { TraderError, TraderErrorCode, getErrorMessage } from '../utils/trader-error.js';

// ============================================================================
// Types
// ============================================================================

export interface GammaMarketsConfig {
  /** REST base URL (default: https://gamma-api.polymarket.com) */
  baseUrl?: string;
  /** Request timeout in ms (default: 8000) */
  timeoutMs?: number;
  /** Page size for active market listing (default: 500) */
  pageSize?: number;
  /** Fetch implementation (default: global fetch) */
  fetchImpl?: typeof fetch;
}

export interface DiscoveredOutcome {
  readonly label: string;
  readonly tokenId: string;
  readonly price: number | undefined;
}

/**
 * Normalized market as seen by discovery
 */
export interface DiscoveredMarket {
  readonly slug: string;
  readonly conditionId: string;
  readonly question: string;
  /** Window start in ms, when known */
  readonly windowStart: number | undefined;
  /** Window end in ms, when known */
  readonly windowEnd: number | undefined;
  readonly active: boolean;
  readonly closed: boolean;
  readonly outcomes: readonly DiscoveredOutcome[];
  /** Explicit numeric threshold published with the market */
  readonly threshold: number | undefined;
  readonly lowerBound: number | undefined;
  readonly upperBound: number | undefined;
}

/**
 * Black-box source of candidate contracts
 */
export interface MarketDiscoverySource {
  /** Active markets whose slug starts with `${prefix}-` */
  listMarkets(prefix: string): Promise<DiscoveredMarket[]>;
  /** A single market by exact slug, or null */
  getMarketBySlug(slug: string): Promise<DiscoveredMarket | null>;
}

// ============================================================================
// Parsing
// ============================================================================

/** Rolling market slugs end in the window start as epoch seconds */
const SLUG_EPOCH_PATTERN = /-(\d{9,11})$/;

function parseTimestamp(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? ms : undefined;
}

/**
 * Window start from the slug suffix, falling back to the event start fields
 */
export function parseWindowStart(slug: string, record: Record<string, unknown>): number | undefined {
  const match = SLUG_EPOCH_PATTERN.exec(slug);
  if (match) {
    return parseInt(match[1], 10) * 1000;
  }
  return parseTimestamp(readString(record, 'eventStartTime')) ?? parseTimestamp(readString(record, 'startDate'));
}

function parseOutcomes(record: Record<string, unknown>): DiscoveredOutcome[] {
  const labels = readArray(record, 'outcomes');
  const prices = readArray(record, 'outcomePrices');
  const tokenIds = readArray(record, 'clobTokenIds');

  const outcomes: DiscoveredOutcome[] = [];
  const count = Math.min(labels.length, tokenIds.length);
  for (let i = 0; i < count; i++) {
    const label = labels[i];
    const tokenId = tokenIds[i];
    if (typeof label !== 'string' || (typeof tokenId !== 'string' && typeof tokenId !== 'number')) {
      continue;
    }
    const rawPrice = prices[i];
    const price = typeof rawPrice === 'string' || typeof rawPrice === 'number' ? Number(rawPrice) : Number.NaN;
    outcomes.push({
      label,
      tokenId: String(tokenId),
      price: Number.isFinite(price) ? price : undefined,
    });
  }
  return outcomes;
}

/**
 * Normalize a raw Gamma market; null when it lacks a slug
 */
export function parseGammaMarket(raw: unknown): DiscoveredMarket | null {
  if (!isRecord(raw)) {
    return null;
  }
  const slug = readString(raw, 'slug');
  if (!slug) {
    return null;
  }

  return {
    slug,
    conditionId: readString(raw, 'conditionId') ?? '',
    question: readString(raw, 'question') ?? '',
    windowStart: parseWindowStart(slug, raw),
    windowEnd: parseTimestamp(readString(raw, 'endDate')),
    active: readBoolean(raw, 'active') ?? true,
    closed: readBoolean(raw, 'closed') ?? false,
    outcomes: parseOutcomes(raw),
    threshold: readNumber(raw, 'groupItemThreshold') ?? readNumber(raw, 'line'),
    lowerBound: readNumber(raw, 'lowerBound'),
    upperBound: readNumber(raw, 'upperBound'),
  };
}

// ============================================================================
// GammaMarketsClient Implementation
// ============================================================================

export class GammaMarketsClient implements MarketDiscoverySource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: GammaMarketsConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'https://gamma-api.polymarket.com').replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 8000;
    this.pageSize = config.pageSize ?? 500;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async listMarkets(prefix: string): Promise<DiscoveredMarket[]> {
    const query = new URLSearchParams({
      active: 'true',
      closed: 'false',
      limit: String(this.pageSize),
      order: 'endDate',
      ascending: 'true',
    });
    const items = await this.getJsonArray(`/markets?${query.toString()}`);
    const familyPrefix = `${prefix}-`;

    const markets: DiscoveredMarket[] = [];
    for (const item of items) {
      const market = parseGammaMarket(item);
      if (market && market.slug.startsWith(familyPrefix) && market.active && !market.closed) {
        markets.push(market);
      }
    }
    return markets;
  }

  async getMarketBySlug(slug: string): Promise<DiscoveredMarket | null> {
    const query = new URLSearchParams({ slug });
    const items = await this.getJsonArray(`/markets?${query.toString()}`);
    for (const item of items) {
      const market = parseGammaMarket(item);
      if (market && market.slug === slug) {
        return market;
      }
    }
    return null;
  }

  private async getJsonArray(path: string): Promise<unknown[]> {
    let body: unknown;
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw new TraderError(
        `Gamma request failed: ${getErrorMessage(error)}`,
        TraderErrorCode.TRANSIENT_FETCH,
        error
      );
    }

    if (!Array.isArray(body)) {
      throw new TraderError('Gamma response is not a market list', TraderErrorCode.TRANSIENT_FETCH);
    }
    return body;
  }
}
