/**
 * EdgeTraderService Unit Tests
 *
 * Drives the full component graph with fake transports and fake timers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { EdgeTraderService, buildSeriesDefinitions, type EdgeTraderConfig } from './edge-trader-service.js';
import type { PriceSubscription } from './contract-price-stream.js';
import type { LedgerSnapshot } from './paper-execution-engine.js';
import { SubscriptionState } from '../clients/clob-market-ws-client.js';
import type { DiscoveredMarket, MarketDiscoverySource } from '../clients/gamma-markets-client.js';
import type { SpotPriceSource } from '../clients/binance-spot-client.js';
import { MemoryAuditSink, TEST_WINDOW_START } from '../persistence/test-fixtures.js';
import { TraderError } from '../utils/trader-error.js';

// ============================================================================
// Fakes
// ============================================================================

const START_TIME = TEST_WINDOW_START + 30_000;

function createTestConfig(overrides: Partial<EdgeTraderConfig> = {}): EdgeTraderConfig {
  return {
    loopIntervalMs: 1000,
    referencePollMs: 1000,
    referenceMaxStalenessMs: 5000,
    marketRefreshSec: 30,
    thresholdBps: 800,
    positionSizeUsd: 25,
    stopLossUsd: 12,
    takeProfitUsd: 18,
    maxRealizedLossUsd: 100,
    fatalStalenessSec: 60,
    maxSeriesNotionalUsd: 1000,
    maxDailyNotionalUsd: 10000,
    estimator: 'threshold',
    sigmaAnnual: 0.8,
    binanceSymbol: 'BTCUSDT',
    gammaApiUrl: 'https://gamma.test',
    clobWsUrl: 'wss://clob.test/ws/market',
    binanceRestUrl: 'https://spot.test',
    series: {
      FIVE_MIN: { prefix: 'btc-updown-5m', seedSlug: 'btc-updown-5m-seed', minHoldSec: 45 },
      FIFTEEN_MIN: { prefix: 'btc-updown-15m', seedSlug: 'btc-updown-15m-seed', minHoldSec: 90 },
    },
    audit: { jsonlPath: './test-data/unused.jsonl', sqliteEnabled: false, sqlitePath: './test-data/unused.db' },
    debug: false,
    ...overrides,
  };
}

function market(prefix: string, windowMs: number): DiscoveredMarket {
  return {
    slug: `${prefix}-${TEST_WINDOW_START / 1000}`,
    conditionId: `0x${prefix}`,
    question: 'Will Bitcoin close above $66,900?',
    windowStart: TEST_WINDOW_START,
    windowEnd: TEST_WINDOW_START + windowMs,
    active: true,
    closed: false,
    outcomes: [
      { label: 'Up', tokenId: `${prefix}-yes`, price: 0.5 },
      { label: 'Down', tokenId: `${prefix}-no`, price: 0.5 },
    ],
    threshold: undefined,
    lowerBound: undefined,
    upperBound: undefined,
  };
}

class FakeDiscovery implements MarketDiscoverySource {
  readonly listCalls: string[] = [];

  async listMarkets(prefix: string): Promise<DiscoveredMarket[]> {
    this.listCalls.push(prefix);
    return [market(prefix, prefix.includes('15m') ? 900_000 : 300_000)];
  }

  async getMarketBySlug(): Promise<DiscoveredMarket | null> {
    return null;
  }
}

/** Subscribes on connect and publishes a YES price of 0.5 */
class FakeSubscription extends EventEmitter implements PriceSubscription {
  private state = SubscriptionState.DISCONNECTED;

  constructor(private readonly tokenId: string) {
    super();
  }

  connect(): void {
    this.state = SubscriptionState.SUBSCRIBED;
    this.emit('subscribed');
    this.emit('price', { tokenId: this.tokenId, price: 0.5, timestamp: Date.now() });
  }

  disconnect(): void {
    this.state = SubscriptionState.DISCONNECTED;
  }

  getState(): SubscriptionState {
    return this.state;
  }

  getDisconnectedAt(): number {
    return 0;
  }

  getTokenId(): string {
    return this.tokenId;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('buildSeriesDefinitions', () => {
  it('should build both series from configuration', () => {
    expect(buildSeriesDefinitions(createTestConfig())).toEqual([
      {
        id: 'FIVE_MIN',
        label: '5m',
        slugPrefix: 'btc-updown-5m',
        windowMs: 300_000,
        minHoldMs: 45_000,
        seedSlug: 'btc-updown-5m-seed',
      },
      {
        id: 'FIFTEEN_MIN',
        label: '15m',
        slugPrefix: 'btc-updown-15m',
        windowMs: 900_000,
        minHoldMs: 90_000,
        seedSlug: 'btc-updown-15m-seed',
      },
    ]);
  });
});

describe('EdgeTraderService', () => {
  let discovery: FakeDiscovery;
  let spotSource: SpotPriceSource;
  let sink: MemoryAuditSink;
  let subscriptions: FakeSubscription[];
  let service: EdgeTraderService;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START_TIME);

    discovery = new FakeDiscovery();
    spotSource = {
      getPrice: vi.fn(async () => ({ symbol: 'btcusdt', price: 67_000, timestamp: Date.now() })),
    };
    sink = new MemoryAuditSink();
    subscriptions = [];
    service = new EdgeTraderService(createTestConfig(), {
      discovery,
      spotSource,
      createSubscription: (tokenId) => {
        const subscription = new FakeSubscription(tokenId);
        subscriptions.push(subscription);
        return subscription;
      },
      auditSinks: [sink],
      now: () => Date.now(),
    });
  });

  afterEach(async () => {
    await service.stop();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should emit started and report running', async () => {
      const started = vi.fn();
      service.on('started', started);

      await service.start();

      expect(service.isRunning()).toBe(true);
      expect(started).toHaveBeenCalledTimes(1);
      expect(spotSource.getPrice).toHaveBeenCalledTimes(1);
    });

    it('should be idempotent', async () => {
      await service.start();
      await service.start();

      await vi.advanceTimersByTimeAsync(1000);

      expect(discovery.listCalls).toEqual(['btc-updown-5m', 'btc-updown-15m']);
      expect(subscriptions.map((subscription) => subscription.getTokenId())).toEqual([
        'btc-updown-5m-yes',
        'btc-updown-15m-yes',
      ]);
    });

    it('should reject an unknown estimator', async () => {
      const invalid = new EdgeTraderService(createTestConfig({ estimator: 'gaussian' }), {
        discovery,
        spotSource,
        auditSinks: [sink],
      });

      await expect(invalid.start()).rejects.toThrow(TraderError);
      await expect(invalid.start()).rejects.toThrow('Unknown estimator: gaussian');
      expect(invalid.isRunning()).toBe(false);
    });
  });

  describe('loop', () => {
    it('should roll, snapshot and open on the first tick of each series', async () => {
      await service.start();
      await vi.advanceTimersByTimeAsync(1000);

      expect(sink.ofKind('market_roll').map((record) => record.slug)).toEqual([
        'btc-updown-5m-1771549800',
        'btc-updown-15m-1771549800',
      ]);

      const snapshots = sink.ofKind('series_snapshot');
      expect(snapshots.map((record) => [record.series, record.decision, record.edgeBps])).toEqual([
        ['FIVE_MIN', 'open', 5000],
        ['FIFTEEN_MIN', 'open', 5000],
      ]);

      const opens = sink.ofKind('paper_submit');
      expect(opens.map((record) => [record.series, record.action, record.side, record.price, record.size])).toEqual([
        ['FIVE_MIN', 'open', 'BUY_YES', 0.5, 50],
        ['FIFTEEN_MIN', 'open', 'BUY_YES', 0.5, 50],
      ]);

      expect(service.getLedger()).toEqual({ realizedPnl: 0, unrealizedPnl: 0, openPositions: 2 });
      expect(service.getRiskState().killSwitch).toBe(false);
    });

    it('should reject opens over the series cap and latch on the reject spike', async () => {
      service = new EdgeTraderService(createTestConfig({ maxSeriesNotionalUsd: 20 }), {
        discovery,
        spotSource,
        createSubscription: (tokenId) => new FakeSubscription(tokenId),
        auditSinks: [sink],
        now: () => Date.now(),
      });

      await service.start();
      await vi.advanceTimersByTimeAsync(2000);

      const snapshots = sink.ofKind('series_snapshot');
      expect(snapshots.slice(0, 2).map((record) => [record.series, record.decision, record.reason])).toEqual([
        ['FIVE_MIN', 'reject', 'series_cap_exceeded'],
        ['FIFTEEN_MIN', 'reject', 'series_cap_exceeded'],
      ]);
      expect(sink.ofKind('paper_submit')).toHaveLength(0);
      expect(service.getRiskState().killSwitchReason).toBe('reject_spike');
    });
  });

  describe('stop', () => {
    it('should close positions, write a final snapshot and close the sinks', async () => {
      const stopped = vi.fn<(ledger: LedgerSnapshot) => void>();
      service.on('stopped', stopped);

      await service.start();
      await vi.advanceTimersByTimeAsync(1000);
      await service.stop();

      const closes = sink.ofKind('paper_submit').filter((record) => record.action === 'close');
      expect(closes.map((record) => [record.series, record.reason, record.realizedPnlDelta])).toEqual([
        ['FIVE_MIN', 'shutdown', 0],
        ['FIFTEEN_MIN', 'shutdown', 0],
      ]);

      const last = sink.records[sink.records.length - 1];
      expect(last.kind).toBe('telemetry_snapshot');
      if (last.kind === 'telemetry_snapshot') {
        expect(last.openPositions).toBe(0);
        expect(last.realizedPnl).toBe(0);
        expect(last.loops).toBe(2);
        expect(last.submits).toBe(4);
        expect(last.rejects).toBe(0);
      }

      expect(sink.closed).toBe(true);
      expect(subscriptions.every((subscription) => subscription.getState() === SubscriptionState.DISCONNECTED)).toBe(
        true
      );
      expect(stopped).toHaveBeenCalledWith({ realizedPnl: 0, unrealizedPnl: 0, openPositions: 0 });
      expect(service.isRunning()).toBe(false);
      expect(service.getLedger()).toBeNull();
    });

    it('should stop ticking after stop', async () => {
      await service.start();
      await vi.advanceTimersByTimeAsync(1000);
      await service.stop();

      const count = sink.records.length;
      await vi.advanceTimersByTimeAsync(5000);

      expect(sink.records).toHaveLength(count);
    });

    it('should be a no-op when not started', async () => {
      const stopped = vi.fn();
      service.on('stopped', stopped);

      await service.stop();

      expect(stopped).not.toHaveBeenCalled();
      expect(sink.closed).toBe(false);
    });
  });
});
