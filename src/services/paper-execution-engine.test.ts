/**
 * PaperExecutionEngine Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PaperExecutionEngine, clampFillPrice } from './paper-execution-engine.js';
import { RiskManager, RiskState } from './risk-manager.js';
import { MemoryAuditSink, TEST_WINDOW_START } from '../persistence/test-fixtures.js';
import { TraderErrorCode, isTraderError } from '../utils/trader-error.js';

const CONTRACT = { slug: 'btc-updown-5m-1771549800', expiry: TEST_WINDOW_START + 300_000 };
const NOW = TEST_WINDOW_START + 30_000;

describe('clampFillPrice', () => {
  it('should clamp into the tradeable range', () => {
    expect(clampFillPrice(0)).toBe(0.0001);
    expect(clampFillPrice(1)).toBe(0.9999);
    expect(clampFillPrice(0.42)).toBe(0.42);
  });
});

describe('PaperExecutionEngine', () => {
  let sink: MemoryAuditSink;
  let risk: RiskManager;
  let engine: PaperExecutionEngine;

  beforeEach(() => {
    sink = new MemoryAuditSink();
    risk = new RiskManager(new RiskState(), {
      stopLossUsd: 12,
      takeProfitUsd: 18,
      maxRealizedLossUsd: 100,
      fatalStalenessMs: 60_000,
      minHoldMs: { FIVE_MIN: 45_000, FIFTEEN_MIN: 90_000 },
    });
    engine = new PaperExecutionEngine(risk, sink, { notionalUsd: 25, now: () => NOW });
  });

  it('should reject a non-positive notional', () => {
    expect(() => new PaperExecutionEngine(risk, sink, { notionalUsd: 0 })).toThrow(
      'Paper notional must be a positive number, got 0'
    );
  });

  describe('open', () => {
    it('should size the position from the notional and entry price', () => {
      const records = engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);

      expect(engine.getPosition('FIVE_MIN')).toEqual({
        series: 'FIVE_MIN',
        slug: CONTRACT.slug,
        side: 'BUY_YES',
        entryPrice: 0.5,
        entryTimestamp: NOW,
        expiry: CONTRACT.expiry,
        size: 50,
      });
      expect(records).toEqual([
        {
          kind: 'paper_submit',
          timestamp: new Date(NOW).toISOString(),
          series: 'FIVE_MIN',
          slug: CONTRACT.slug,
          action: 'open',
          reason: 'signal',
          side: 'BUY_YES',
          price: 0.5,
          size: 50,
          notionalUsd: 25,
          realizedPnlDelta: 0,
          realizedPnlTotal: 0,
          unrealizedPnl: 0,
        },
      ]);
      expect(sink.records).toEqual(records);
    });

    it('should price a NO position on the NO token', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_NO', 0.75);

      const position = engine.getPosition('FIVE_MIN');
      expect(position?.entryPrice).toBe(0.25);
      expect(position?.size).toBe(100);
    });

    it('should clamp the fill price', () => {
      const [record] = engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0);
      expect(record.price).toBe(0.0001);
      expect(record.size).toBeCloseTo(250000, 3);
    });

    it('should refuse a second position on the same series', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);
      expect(() => engine.open('FIVE_MIN', CONTRACT, 'BUY_NO', 0.5)).toThrow(
        'Series FIVE_MIN already has an open position'
      );
      expect(sink.records).toHaveLength(1);
    });

    it('should leave the ledger untouched on an invalid price', () => {
      let caught: unknown;
      try {
        engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 1.2);
      } catch (error) {
        caught = error;
      }

      expect(isTraderError(caught, TraderErrorCode.INVALID_PRICE)).toBe(true);
      expect(engine.getPosition('FIVE_MIN')).toBeNull();
      expect(sink.records).toHaveLength(0);
    });
  });

  describe('close', () => {
    it('should realize PnL on the held token', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);
      const [record] = engine.close('FIVE_MIN', 0.75, 'take_profit');

      expect(record).toMatchObject({
        action: 'close',
        reason: 'take_profit',
        side: 'BUY_YES',
        price: 0.75,
        size: 50,
        notionalUsd: 37.5,
        realizedPnlDelta: 12.5,
        realizedPnlTotal: 12.5,
        unrealizedPnl: 0,
      });
      expect(engine.getPosition('FIVE_MIN')).toBeNull();
      expect(risk.snapshot().realizedPnl).toBe(12.5);
    });

    it('should gain on a NO position when YES falls', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_NO', 0.75);
      const [record] = engine.close('FIVE_MIN', 0.5, 'signal');

      // NO bought at 0.25, sold at 0.5, 100 tokens
      expect(record.realizedPnlDelta).toBe(25);
    });

    it('should return nothing without a position', () => {
      expect(engine.close('FIVE_MIN', 0.5, 'expiry')).toEqual([]);
      expect(sink.records).toHaveLength(0);
    });

    it('should accumulate realized PnL across series', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);
      engine.open(
        'FIFTEEN_MIN',
        { slug: 'btc-updown-15m-1771551000', expiry: TEST_WINDOW_START + 900_000 },
        'BUY_YES',
        0.5
      );

      engine.close('FIVE_MIN', 0.25, 'stop_loss');
      const [record] = engine.close('FIFTEEN_MIN', 0.75, 'take_profit');

      expect(record.realizedPnlTotal).toBe(0);
      expect(risk.snapshot().realizedPnl).toBe(0);
    });
  });

  describe('flip', () => {
    it('should append a close then an open for the same tick', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);
      const records = engine.flip('FIVE_MIN', CONTRACT, 'BUY_NO', 0.75);

      expect(records.map((record) => [record.action, record.reason, record.side])).toEqual([
        ['close', 'flip', 'BUY_YES'],
        ['open', 'flip', 'BUY_NO'],
      ]);
      expect(records[0].realizedPnlDelta).toBe(12.5);
      expect(records[1]).toMatchObject({ price: 0.25, size: 100, realizedPnlTotal: 12.5, unrealizedPnl: 0 });
      expect(engine.getPosition('FIVE_MIN')?.side).toBe('BUY_NO');
      expect(sink.kinds()).toEqual(['paper_submit', 'paper_submit', 'paper_submit']);
    });

    it('should refuse to flip into the held side', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);
      expect(() => engine.flip('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5)).toThrow(
        'Series FIVE_MIN position is already BUY_YES'
      );
    });

    it('should refuse to flip without a position', () => {
      expect(() => engine.flip('FIVE_MIN', CONTRACT, 'BUY_NO', 0.5)).toThrow('Series FIVE_MIN has no position to flip');
    });
  });

  it('should count every opened leg against the notional caps', () => {
    engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);
    engine.flip('FIVE_MIN', CONTRACT, 'BUY_NO', 0.5);
    engine.close('FIVE_MIN', 0.5, 'signal');

    expect(risk.openedNotional('FIVE_MIN', NOW)).toEqual({ series: 50, daily: 50 });
    expect(risk.openedNotional('FIFTEEN_MIN', NOW)).toEqual({ series: 0, daily: 50 });
  });

  describe('snapshot', () => {
    it('should value open positions at the given marks and remember them', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_YES', 0.5);

      expect(engine.snapshot({ FIVE_MIN: 0.75 })).toEqual({
        realizedPnl: 0,
        unrealizedPnl: 12.5,
        openPositions: 1,
      });
      expect(engine.snapshot().unrealizedPnl).toBe(12.5);
    });

    it('should fall back to the last fill price as the mark', () => {
      engine.open('FIVE_MIN', CONTRACT, 'BUY_NO', 0.75);
      expect(engine.snapshot()).toEqual({ realizedPnl: 0, unrealizedPnl: 0, openPositions: 1 });
    });
  });
});
