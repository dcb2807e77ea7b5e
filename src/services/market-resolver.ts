/**
 * Market Resolver
 *
 * Owns contract identity per series. Each call to resolve() confirms the
 * active contract from cache, or re-runs discovery when the cache is older
 * than the refresh interval, the contract has expired, or the caller forces
 * it. A change of slug is reported as a roll; the caller sequences the
 * audit record, force-close and resubscription that follow.
 *
 * Discovery order:
 * 1. Active markets for the series prefix whose window contains "now"
 * 2. The configured seed slug, if its window has not ended
 * 3. The cached contract, if it has not expired
 * Otherwise the series has no contract this tick (CONTRACT_NOT_FOUND).
 */

import type { Contract, SeriesDefinition, SeriesId } from '../types/market.types.js';
import type { DiscoveredMarket, MarketDiscoverySource } from '../clients/gamma-markets-client.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { TraderError, TraderErrorCode, getErrorMessage } from '../utils/trader-error.js';

// ============================================================================
// Types
// ============================================================================

export interface MarketResolverConfig {
  /** Series to resolve, keyed by id */
  series: readonly SeriesDefinition[];
  /** Minimum time between discovery queries per series (ms) */
  refreshIntervalMs: number;
  /** Clock (default: Date.now) */
  now?: () => number;
  logger?: IStrategyLogger;
}

export interface ResolveOptions {
  /** Bypass the cache (e.g., the stream reported an unknown contract) */
  force?: boolean;
}

export interface ResolveResult {
  readonly contract: Contract;
  /** Contract that was active before this call, when it rolled */
  readonly previous: Contract | null;
  /** True when the active slug changed, including the first resolution */
  readonly rolled: boolean;
}

interface CacheEntry {
  contract: Contract;
  fetchedAt: number;
}

// ============================================================================
// Metadata parsing
// ============================================================================

const STRIKE_PATTERN = /\b(?:above|hit)\s+\$?\s*([0-9][0-9,]*(?:\.[0-9]+)?)\s*([kmb])?\b/i;

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
};

const YES_LABELS = new Set(['yes', 'up']);
const NO_LABELS = new Set(['no', 'down']);

/**
 * Parse a strike from question text such as "above $67,000" or "hit $67k"
 */
export function parseStrikeFromQuestion(question: string): number | undefined {
  const match = STRIKE_PATTERN.exec(question);
  if (!match) {
    return undefined;
  }
  const base = parseFloat(match[1].replace(/,/g, ''));
  const multiplier = match[2] ? SUFFIX_MULTIPLIERS[match[2].toLowerCase()] : 1;
  const strike = base * multiplier;
  return Number.isFinite(strike) && strike > 0 ? strike : undefined;
}

/**
 * Strike from the question, else the explicit threshold, else the bounds midpoint
 */
export function deriveStrike(market: DiscoveredMarket): number | undefined {
  const fromQuestion = parseStrikeFromQuestion(market.question);
  if (fromQuestion !== undefined) {
    return fromQuestion;
  }
  if (market.threshold !== undefined && market.threshold > 0) {
    return market.threshold;
  }
  if (market.lowerBound !== undefined && market.upperBound !== undefined) {
    const midpoint = (market.lowerBound + market.upperBound) / 2;
    return midpoint > 0 ? midpoint : undefined;
  }
  return undefined;
}

/**
 * Build a Contract from a discovered market.
 * @throws TraderError METADATA_INCOMPLETE when strike, expiry or YES token is missing
 */
export function toContract(definition: SeriesDefinition, market: DiscoveredMarket): Contract {
  const missing: string[] = [];

  const strike = deriveStrike(market);
  if (strike === undefined) missing.push('strike');

  const expiry = market.windowEnd;
  if (expiry === undefined) missing.push('endDate');

  const yes = market.outcomes.find((outcome) => YES_LABELS.has(outcome.label.toLowerCase()));
  if (!yes) missing.push('yesTokenId');

  if (strike === undefined || expiry === undefined || !yes) {
    throw new TraderError(
      `Market ${market.slug} is missing ${missing.join(', ')}`,
      TraderErrorCode.METADATA_INCOMPLETE
    );
  }

  const no = market.outcomes.find((outcome) => NO_LABELS.has(outcome.label.toLowerCase()));

  return {
    series: definition.id,
    slug: market.slug,
    conditionId: market.conditionId,
    question: market.question,
    strike,
    windowStart: market.windowStart ?? expiry - definition.windowMs,
    expiry,
    yesTokenId: yes.tokenId,
    ...(no ? { noTokenId: no.tokenId } : {}),
  };
}

function windowContains(definition: SeriesDefinition, market: DiscoveredMarket, now: number): boolean {
  if (market.windowEnd === undefined) {
    return false;
  }
  const start = market.windowStart ?? market.windowEnd - definition.windowMs;
  return start <= now && now < market.windowEnd;
}

// ============================================================================
// MarketResolver Implementation
// ============================================================================

export class MarketResolver {
  private readonly definitions = new Map<SeriesId, SeriesDefinition>();
  private readonly cache = new Map<SeriesId, CacheEntry>();
  private readonly refreshIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: IStrategyLogger;

  constructor(
    private readonly source: MarketDiscoverySource,
    config: MarketResolverConfig
  ) {
    for (const definition of config.series) {
      this.definitions.set(definition.id, definition);
    }
    this.refreshIntervalMs = config.refreshIntervalMs;
    this.now = config.now ?? (() => Date.now());
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Confirm or rotate the active contract for a series.
   * @throws TraderError CONTRACT_NOT_FOUND or METADATA_INCOMPLETE; the series skips this tick
   */
  async resolve(series: SeriesId, options: ResolveOptions = {}): Promise<ResolveResult> {
    const definition = this.getDefinition(series);
    const now = this.now();
    const cached = this.cache.get(series);

    if (
      cached &&
      !options.force &&
      now < cached.contract.expiry &&
      now - cached.fetchedAt < this.refreshIntervalMs
    ) {
      return { contract: cached.contract, previous: null, rolled: false };
    }

    const discovered = await this.discover(definition, now);

    if (!discovered) {
      if (cached && now < cached.contract.expiry) {
        return { contract: cached.contract, previous: null, rolled: false };
      }
      throw new TraderError(
        `No live contract for ${definition.slugPrefix}`,
        TraderErrorCode.CONTRACT_NOT_FOUND
      );
    }

    const contract = toContract(definition, discovered);
    this.cache.set(series, { contract, fetchedAt: now });

    const previous = cached?.contract ?? null;
    if (previous && previous.slug === contract.slug) {
      return { contract, previous: null, rolled: false };
    }
    return { contract, previous, rolled: true };
  }

  /**
   * Currently cached contract for a series, if any
   */
  getActive(series: SeriesId): Contract | null {
    return this.cache.get(series)?.contract ?? null;
  }

  private async discover(definition: SeriesDefinition, now: number): Promise<DiscoveredMarket | null> {
    try {
      const markets = await this.source.listMarkets(definition.slugPrefix);
      const live = markets
        .filter((market) => windowContains(definition, market, now))
        .sort((a, b) => (a.windowEnd ?? 0) - (b.windowEnd ?? 0));
      if (live.length > 0) {
        return live[0];
      }
    } catch (error) {
      this.logger.warn(LogEvents.MARKET_RESOLVE_FAILED, {
        series: definition.id,
        error: getErrorMessage(error),
        reason: 'discovery',
      });
    }

    return this.discoverSeed(definition, now);
  }

  private async discoverSeed(definition: SeriesDefinition, now: number): Promise<DiscoveredMarket | null> {
    if (!definition.seedSlug) {
      return null;
    }

    let seed: DiscoveredMarket | null;
    try {
      seed = await this.source.getMarketBySlug(definition.seedSlug);
    } catch (error) {
      this.logger.warn(LogEvents.MARKET_RESOLVE_FAILED, {
        series: definition.id,
        slug: definition.seedSlug,
        error: getErrorMessage(error),
        reason: 'seed',
      });
      return null;
    }

    if (!seed || seed.windowEnd === undefined || seed.windowEnd <= now) {
      return null;
    }

    this.logger.info(LogEvents.MARKET_SEED_FALLBACK, { series: definition.id, slug: seed.slug });
    return seed;
  }

  private getDefinition(series: SeriesId): SeriesDefinition {
    const definition = this.definitions.get(series);
    if (!definition) {
      throw new Error(`Unknown series: ${series}`);
    }
    return definition;
  }
}
