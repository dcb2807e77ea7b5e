/**
 * Contract Price Stream
 *
 * One long-lived outcome-price subscription per series, pointed at the
 * active contract's YES token. Updates land in a single-slot latest-wins
 * cell; readers get a ContractReading and must treat anything other than
 * `quote` as "no tradeable price this tick".
 *
 * Rollover: subscribe() with a new contract tears the old subscription down
 * regardless of its state and connects a fresh one. The previous cell's last
 * price is gone afterwards, so callers read lastObservedPrice() first.
 */

import type { EventEmitter } from 'events';
import type { Contract, ContractReading, Quote, SeriesId } from '../types/market.types.js';
import {
  ClobMarketWsClient,
  SubscriptionState,
  type ClobMarketWsConfig,
  type OutcomePriceUpdate,
  type ReconnectScheduledEvent,
} from '../clients/clob-market-ws-client.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome-price subscription for one token, as driven by the stream
 */
export interface PriceSubscription extends EventEmitter {
  connect(): void;
  disconnect(): void;
  getState(): SubscriptionState;
  getDisconnectedAt(): number;
  getTokenId(): string;
}

export type PriceSubscriptionFactory = (tokenId: string) => PriceSubscription;

export interface ContractPriceStreamConfig {
  /** Quote age after which a reading is stale (ms) */
  staleAfterMs: number;
  /** Subscription factory (default: ClobMarketWsClient) */
  createSubscription?: PriceSubscriptionFactory;
  /** Options for the default client factory */
  clientOptions?: Omit<ClobMarketWsConfig, 'tokenId'>;
  /** Clock (default: Date.now) */
  now?: () => number;
  logger?: IStrategyLogger;
}

interface SeriesCell {
  readonly contract: Contract;
  readonly subscription: PriceSubscription;
  readonly subscribedAt: number;
  latest: Quote | null;
}

// ============================================================================
// ContractPriceStream Implementation
// ============================================================================

export class ContractPriceStream {
  private readonly cells = new Map<SeriesId, SeriesCell>();
  private readonly staleAfterMs: number;
  private readonly createSubscription: PriceSubscriptionFactory;
  private readonly now: () => number;
  private readonly logger: IStrategyLogger;
  private readonly createdAt: number;

  constructor(config: ContractPriceStreamConfig) {
    this.staleAfterMs = config.staleAfterMs;
    this.now = config.now ?? (() => Date.now());
    this.logger = config.logger ?? silentLogger;
    this.createdAt = this.now();

    const clientOptions = config.clientOptions ?? {};
    this.createSubscription =
      config.createSubscription ??
      ((tokenId: string) => new ClobMarketWsClient({ ...clientOptions, tokenId, staleTimeout: this.staleAfterMs }));
  }

  /**
   * Point the series at a contract. No-op when already subscribed to it.
   */
  subscribe(contract: Contract): void {
    const existing = this.cells.get(contract.series);
    if (existing && existing.contract.slug === contract.slug) {
      return;
    }
    if (existing) {
      this.teardown(existing);
    }

    const subscription = this.createSubscription(contract.yesTokenId);
    const cell: SeriesCell = {
      contract,
      subscription,
      subscribedAt: this.now(),
      latest: null,
    };
    this.cells.set(contract.series, cell);
    this.attach(cell);
    subscription.connect();
  }

  unsubscribe(series: SeriesId): void {
    const cell = this.cells.get(series);
    if (cell) {
      this.teardown(cell);
      this.cells.delete(series);
    }
  }

  /**
   * Latest reading for a series
   */
  latest(series: SeriesId, now: number = this.now()): ContractReading {
    const cell = this.cells.get(series);
    if (!cell) {
      return { kind: 'disconnected', since: this.createdAt };
    }

    const state = cell.subscription.getState();
    if (state === SubscriptionState.DISCONNECTED || state === SubscriptionState.CONNECTING) {
      return { kind: 'disconnected', since: Math.max(cell.subscribedAt, cell.subscription.getDisconnectedAt()) };
    }

    if (!cell.latest) {
      return { kind: 'disconnected', since: cell.subscribedAt };
    }

    const ageMs = now - cell.latest.observedAt;
    if (state === SubscriptionState.STALE || ageMs > this.staleAfterMs) {
      return { kind: 'stale', lastQuote: cell.latest, ageMs };
    }
    return { kind: 'quote', quote: cell.latest };
  }

  /**
   * Start of the current outage for a series, or null while it has a live subscription
   */
  disconnectedSince(series: SeriesId, now: number = this.now()): number | null {
    const reading = this.latest(series, now);
    return reading.kind === 'disconnected' ? reading.since : null;
  }

  /**
   * Last YES price seen for the series' current contract, regardless of freshness
   */
  lastObservedPrice(series: SeriesId): number | null {
    return this.cells.get(series)?.latest?.value ?? null;
  }

  activeSlug(series: SeriesId): string | null {
    return this.cells.get(series)?.contract.slug ?? null;
  }

  getState(series: SeriesId): SubscriptionState {
    return this.cells.get(series)?.subscription.getState() ?? SubscriptionState.DISCONNECTED;
  }

  /**
   * Tear down every subscription
   */
  stop(): void {
    for (const cell of this.cells.values()) {
      this.teardown(cell);
    }
    this.cells.clear();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private attach(cell: SeriesCell): void {
    const { contract, subscription } = cell;
    const context = { series: contract.series, slug: contract.slug, tokenId: contract.yesTokenId };

    subscription.on('price', (update: OutcomePriceUpdate) => {
      if (update.tokenId !== contract.yesTokenId) {
        return;
      }
      cell.latest = { source: 'contract', value: update.price, observedAt: update.timestamp };
    });

    subscription.on('subscribed', () => {
      this.logger.info(LogEvents.STREAM_CONNECTED, { ...context, state: SubscriptionState.SUBSCRIBED });
    });

    subscription.on('stale', () => {
      const stalenessMs = cell.latest ? this.now() - cell.latest.observedAt : undefined;
      this.logger.warn(LogEvents.STREAM_STALE, { ...context, state: SubscriptionState.STALE, stalenessMs });
    });

    subscription.on('disconnected', () => {
      this.logger.warn(LogEvents.STREAM_DISCONNECTED, { ...context, state: SubscriptionState.DISCONNECTED });
    });

    subscription.on('reconnectScheduled', (event: ReconnectScheduledEvent) => {
      this.logger.info(LogEvents.STREAM_RECONNECT_SCHEDULED, {
        ...context,
        attempt: event.attempt,
        delayMs: event.delayMs,
      });
    });

    subscription.on('error', (error: Error) => {
      this.logger.warn(LogEvents.STREAM_ERROR, { ...context, error: error.message });
    });
  }

  private teardown(cell: SeriesCell): void {
    cell.subscription.removeAllListeners();
    cell.subscription.disconnect();
  }
}
