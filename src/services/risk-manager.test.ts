/**
 * RiskManager Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RiskManager, RiskState, type RiskInput } from './risk-manager.js';
import type { Signal, SignalDirection } from '../types/market.types.js';
import { TEST_WINDOW_START, createContract, createPosition } from '../persistence/test-fixtures.js';

// ============================================================================
// Test Utilities
// ============================================================================

const ENTRY_AT = TEST_WINDOW_START + 10_000;

function signal(direction: SignalDirection, edgeBps = 1200): Signal {
  return { series: 'FIVE_MIN', direction, edgeBps, timestamp: ENTRY_AT };
}

function input(overrides: Partial<RiskInput> = {}): RiskInput {
  return {
    series: 'FIVE_MIN',
    now: ENTRY_AT + 60_000,
    contract: createContract(),
    signal: null,
    position: null,
    markYesPrice: 0.5,
    feedHealth: { referenceUnavailableSince: null, contractDisconnectedSince: null },
    ...overrides,
  };
}

describe('RiskManager', () => {
  let state: RiskState;
  let risk: RiskManager;

  beforeEach(() => {
    state = new RiskState();
    risk = new RiskManager(state, {
      stopLossUsd: 12,
      takeProfitUsd: 18,
      maxRealizedLossUsd: 100,
      fatalStalenessMs: 60_000,
      minHoldMs: { FIVE_MIN: 45_000, FIFTEEN_MIN: 90_000 },
    });
  });

  describe('without a position', () => {
    it('should open on a directional signal', () => {
      expect(risk.evaluate(input({ signal: signal('BUY_YES') }))).toEqual({ type: 'open', side: 'BUY_YES' });
      expect(risk.evaluate(input({ signal: signal('BUY_NO', -1500) }))).toEqual({ type: 'open', side: 'BUY_NO' });
    });

    it('should do nothing on FLAT or without a signal', () => {
      expect(risk.evaluate(input({ signal: signal('FLAT', 100) }))).toEqual({ type: 'no_op' });
      expect(risk.evaluate(input())).toEqual({ type: 'no_op' });
    });

    it('should reject opens while the kill switch is on', () => {
      risk.activateKillSwitch('manual', ENTRY_AT);
      expect(risk.evaluate(input({ signal: signal('BUY_YES') }))).toEqual({ type: 'reject', reason: 'kill_switch' });
    });
  });

  describe('with a position', () => {
    const position = createPosition({ side: 'BUY_YES', entryPrice: 0.5, size: 50, entryTimestamp: ENTRY_AT });

    it('should hold on the same direction without re-entry', () => {
      expect(risk.evaluate(input({ position, signal: signal('BUY_YES') }))).toEqual({ type: 'hold' });
    });

    it('should hold on FLAT', () => {
      expect(risk.evaluate(input({ position, signal: signal('FLAT', 0) }))).toEqual({ type: 'hold' });
    });

    it('should reject an opposite signal inside the minimum hold', () => {
      const decision = risk.evaluate(
        input({ position, signal: signal('BUY_NO', -1500), now: ENTRY_AT + 44_999 })
      );
      expect(decision).toEqual({ type: 'reject', reason: 'min_hold' });
    });

    it('should flip on an opposite signal once the minimum hold has passed', () => {
      const decision = risk.evaluate(
        input({ position, signal: signal('BUY_NO', -1500), now: ENTRY_AT + 45_000 })
      );
      expect(decision).toEqual({ type: 'flip', side: 'BUY_NO' });
    });

    it('should use the series minimum hold', () => {
      const fifteen = createPosition({ series: 'FIFTEEN_MIN', entryTimestamp: ENTRY_AT });
      const decision = risk.evaluate(
        input({
          series: 'FIFTEEN_MIN',
          contract: null,
          position: fifteen,
          signal: { ...signal('BUY_NO', -1500), series: 'FIFTEEN_MIN' },
          now: ENTRY_AT + 60_000,
        })
      );
      expect(decision).toEqual({ type: 'reject', reason: 'min_hold' });
    });

    it('should degrade a flip to a close while the kill switch is on', () => {
      risk.activateKillSwitch('manual', ENTRY_AT);
      const decision = risk.evaluate(input({ position, signal: signal('BUY_NO', -1500) }));
      expect(decision).toEqual({ type: 'close', reason: 'flip' });
    });

    it('should stop out regardless of signal and hold time', () => {
      // (0.25 - 0.5) * 50 = -12.5
      const decision = risk.evaluate(
        input({ position, signal: signal('BUY_YES'), markYesPrice: 0.25, now: ENTRY_AT + 1000 })
      );
      expect(decision).toEqual({ type: 'close', reason: 'stop_loss' });
    });

    it('should take profit past the threshold', () => {
      // (0.9 - 0.5) * 50 = 20
      const decision = risk.evaluate(input({ position, signal: signal('BUY_YES'), markYesPrice: 0.9 }));
      expect(decision).toEqual({ type: 'close', reason: 'take_profit' });
    });

    it('should mark a NO position on the NO token price', () => {
      const short = createPosition({ side: 'BUY_NO', entryPrice: 0.5, size: 50, entryTimestamp: ENTRY_AT });
      // NO token at 1 - 0.76 = 0.24: (0.24 - 0.5) * 50 = -13
      const decision = risk.evaluate(input({ position: short, markYesPrice: 0.76 }));
      expect(decision).toEqual({ type: 'close', reason: 'stop_loss' });
    });

    it('should still stop out while the kill switch is on', () => {
      risk.activateKillSwitch('manual', ENTRY_AT);
      const decision = risk.evaluate(input({ position, markYesPrice: 0.2 }));
      expect(decision).toEqual({ type: 'close', reason: 'stop_loss' });
    });

    it('should skip stop checks without a tradeable mark', () => {
      const decision = risk.evaluate(input({ position, markYesPrice: null, signal: signal('BUY_YES') }));
      expect(decision).toEqual({ type: 'hold' });
    });

    it('should close a position pinned to a retired contract', () => {
      const next = createContract({ slug: 'btc-updown-5m-1771550100' });
      const decision = risk.evaluate(input({ position, contract: next, signal: signal('BUY_YES') }));
      expect(decision).toEqual({ type: 'close', reason: 'rollover' });
    });

    it('should close a position past its own expiry with no active contract', () => {
      const decision = risk.evaluate(input({ position, contract: null, now: position.expiry }));
      expect(decision).toEqual({ type: 'close', reason: 'expiry' });
    });

    it('should keep holding just before its own expiry', () => {
      const decision = risk.evaluate(input({ position, contract: null, now: position.expiry - 1 }));
      expect(decision).toEqual({ type: 'hold' });
    });

    it('should close a position at contract expiry', () => {
      const contract = createContract();
      const decision = risk.evaluate(input({ position, contract, now: contract.expiry }));
      expect(decision).toEqual({ type: 'close', reason: 'expiry' });
    });
  });

  describe('notional caps', () => {
    const NEXT_UTC_DAY = Date.UTC(2026, 1, 21);

    beforeEach(() => {
      risk = new RiskManager(state, {
        stopLossUsd: 12,
        takeProfitUsd: 18,
        maxRealizedLossUsd: 100,
        fatalStalenessMs: 60_000,
        minHoldMs: { FIVE_MIN: 45_000, FIFTEEN_MIN: 90_000 },
        notionalCaps: { orderUsd: 25, perSeriesUsd: 50, dailyUsd: 60 },
      });
    });

    it('should open up to the series cap and reject past it', () => {
      risk.recordOpened('FIVE_MIN', 25, ENTRY_AT);
      expect(risk.evaluate(input({ signal: signal('BUY_YES') }))).toEqual({ type: 'open', side: 'BUY_YES' });

      risk.recordOpened('FIVE_MIN', 25, ENTRY_AT);
      expect(risk.evaluate(input({ signal: signal('BUY_YES') }))).toEqual({
        type: 'reject',
        reason: 'series_cap_exceeded',
      });
    });

    it('should reject past the daily cap across series', () => {
      risk.recordOpened('FIVE_MIN', 25, ENTRY_AT);
      risk.recordOpened('FIVE_MIN', 25, ENTRY_AT);

      const decision = risk.evaluate(
        input({ series: 'FIFTEEN_MIN', signal: { ...signal('BUY_YES'), series: 'FIFTEEN_MIN' } })
      );

      expect(decision).toEqual({ type: 'reject', reason: 'daily_cap_exceeded' });
      expect(risk.openedNotional('FIFTEEN_MIN', ENTRY_AT)).toEqual({ series: 0, daily: 50 });
    });

    it('should reset the opened notional at UTC midnight', () => {
      risk.recordOpened('FIVE_MIN', 50, ENTRY_AT);

      expect(risk.openedNotional('FIVE_MIN', NEXT_UTC_DAY - 1)).toEqual({ series: 50, daily: 50 });
      expect(risk.openedNotional('FIVE_MIN', NEXT_UTC_DAY)).toEqual({ series: 0, daily: 0 });
      expect(risk.evaluate(input({ now: NEXT_UTC_DAY, contract: null, signal: signal('BUY_YES') }))).toEqual({
        type: 'open',
        side: 'BUY_YES',
      });
    });

    it('should degrade a flip to a close once the series cap is used up', () => {
      const position = createPosition({ entryTimestamp: ENTRY_AT });
      risk.recordOpened('FIVE_MIN', 50, ENTRY_AT);

      const decision = risk.evaluate(input({ position, signal: signal('BUY_NO', -1500) }));

      expect(decision).toEqual({ type: 'close', reason: 'flip' });
    });
  });

  describe('kill switch', () => {
    it('should latch on a realized loss at the cap', () => {
      risk.recordRealized(-60, ENTRY_AT);
      expect(risk.snapshot().killSwitch).toBe(false);

      const total = risk.recordRealized(-40, ENTRY_AT + 1);

      expect(total).toBe(-100);
      expect(risk.snapshot()).toEqual({
        killSwitch: true,
        killSwitchReason: 'max_realized_loss',
        killSwitchActivatedAt: ENTRY_AT + 1,
        realizedPnl: -100,
      });
    });

    it('should latch when the reference feed is out beyond the fatal bound', () => {
      const now = ENTRY_AT + 60_000;
      const decision = risk.evaluate(
        input({
          now,
          signal: signal('BUY_YES'),
          feedHealth: { referenceUnavailableSince: now - 60_001, contractDisconnectedSince: null },
        })
      );

      expect(decision).toEqual({ type: 'reject', reason: 'kill_switch' });
      expect(risk.snapshot().killSwitchReason).toBe('reference_feed_unavailable');
    });

    it('should not latch at exactly the fatal bound', () => {
      const now = ENTRY_AT + 60_000;
      risk.evaluate(
        input({ now, feedHealth: { referenceUnavailableSince: null, contractDisconnectedSince: now - 60_000 } })
      );
      expect(risk.snapshot().killSwitch).toBe(false);
    });

    it('should latch when the outcome stream is disconnected beyond the fatal bound', () => {
      const now = ENTRY_AT + 120_000;
      risk.evaluate(
        input({ now, feedHealth: { referenceUnavailableSince: null, contractDisconnectedSince: ENTRY_AT } })
      );
      expect(risk.snapshot().killSwitchReason).toBe('contract_stream_disconnected');
    });

    it('should latch on a reject spike alert', () => {
      risk.applyAlerts({ rejectSpike: false, p95LatencyBreach: true }, ENTRY_AT);
      expect(risk.snapshot().killSwitch).toBe(false);

      risk.applyAlerts({ rejectSpike: true, p95LatencyBreach: false }, ENTRY_AT + 1);

      expect(risk.snapshot()).toMatchObject({
        killSwitch: true,
        killSwitchReason: 'reject_spike',
        killSwitchActivatedAt: ENTRY_AT + 1,
      });
    });

    it('should keep the first reason once latched', () => {
      risk.activateKillSwitch('manual', ENTRY_AT);
      risk.recordRealized(-150, ENTRY_AT + 5);

      expect(risk.snapshot().killSwitchReason).toBe('manual');
      expect(risk.snapshot().killSwitchActivatedAt).toBe(ENTRY_AT);
    });

    it('should share state between managers', () => {
      const other = new RiskManager(state, {
        stopLossUsd: 12,
        takeProfitUsd: 18,
        maxRealizedLossUsd: 100,
        fatalStalenessMs: 60_000,
        minHoldMs: { FIVE_MIN: 45_000, FIFTEEN_MIN: 90_000 },
      });
      risk.activateKillSwitch('manual', ENTRY_AT);

      expect(other.snapshot().killSwitch).toBe(true);
    });
  });
});
