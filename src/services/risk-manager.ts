/**
 * Risk Manager
 *
 * Stateful gate between the edge signal and paper execution. Decides, per
 * series and tick, what happens to the series' position; never touches the
 * ledger itself.
 *
 * Evaluation order:
 * 1. Kill-switch conditions (may latch the switch)
 * 2. Stop-loss / take-profit on the open position, independent of the signal
 * 3. Position pinned to a retired contract -> close (rollover); past its own
 *    expiry -> close (expiry), with or without an active contract
 * 4. Signal table (open / hold / flip / min-hold reject / notional caps)
 *
 * The kill switch, cumulative realized PnL and the day's opened notional
 * live in RiskState. RiskManager is its single writer; everything else reads
 * snapshots.
 */

import {
  unrealizedPnl,
  type Contract,
  type Position,
  type PositionSide,
  type SeriesId,
  type Signal,
} from '../types/market.types.js';
import type { PaperReason, TelemetryAlerts } from '../types/audit.types.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';

// ============================================================================
// Risk State
// ============================================================================

export interface RiskStateSnapshot {
  readonly killSwitch: boolean;
  readonly killSwitchReason: string | null;
  readonly killSwitchActivatedAt: number | null;
  /** Cumulative realized PnL across all series (USD) */
  readonly realizedPnl: number;
}

export interface OpenedNotional {
  /** Notional opened on the series today (USD) */
  readonly series: number;
  /** Notional opened across all series today (USD) */
  readonly daily: number;
}

/** UTC calendar day of a timestamp, e.g. 2026-02-20 */
function utcDay(at: number): string {
  return new Date(at).toISOString().slice(0, 10);
}

/**
 * Process-wide risk state. Mutated only through RiskManager.
 */
export class RiskState {
  private killSwitch = false;
  private killSwitchReason: string | null = null;
  private killSwitchActivatedAt: number | null = null;
  private realizedPnl = 0;
  private openedDay: string | null = null;
  private openedToday = 0;
  private readonly openedBySeries = new Map<SeriesId, number>();

  snapshot(): RiskStateSnapshot {
    return {
      killSwitch: this.killSwitch,
      killSwitchReason: this.killSwitchReason,
      killSwitchActivatedAt: this.killSwitchActivatedAt,
      realizedPnl: this.realizedPnl,
    };
  }

  /** @internal */
  addRealized(delta: number): number {
    this.realizedPnl += delta;
    return this.realizedPnl;
  }

  /**
   * Latch the switch. Returns false when it was already on.
   * @internal
   */
  latch(reason: string, at: number): boolean {
    if (this.killSwitch) {
      return false;
    }
    this.killSwitch = true;
    this.killSwitchReason = reason;
    this.killSwitchActivatedAt = at;
    return true;
  }

  openedNotional(series: SeriesId, at: number): OpenedNotional {
    this.rollDay(at);
    return { series: this.openedBySeries.get(series) ?? 0, daily: this.openedToday };
  }

  /** @internal */
  addOpened(series: SeriesId, notional: number, at: number): void {
    this.rollDay(at);
    this.openedBySeries.set(series, (this.openedBySeries.get(series) ?? 0) + notional);
    this.openedToday += notional;
  }

  /** Opened notional counts from UTC midnight */
  private rollDay(at: number): void {
    const day = utcDay(at);
    if (day !== this.openedDay) {
      this.openedDay = day;
      this.openedToday = 0;
      this.openedBySeries.clear();
    }
  }
}

// ============================================================================
// Types
// ============================================================================

export interface RiskManagerConfig {
  /** Unrealized loss that forces a close (USD, positive) */
  stopLossUsd: number;
  /** Unrealized gain that forces a close (USD, positive) */
  takeProfitUsd: number;
  /** Cumulative realized loss that latches the kill switch (USD, positive) */
  maxRealizedLossUsd: number;
  /** Feed outage that latches the kill switch (ms) */
  fatalStalenessMs: number;
  /** Minimum hold before a flip, per series (ms) */
  minHoldMs: Readonly<Record<SeriesId, number>>;
  /** Opened-notional limits; unlimited when omitted */
  notionalCaps?: NotionalCaps;
  logger?: IStrategyLogger;
}

export interface NotionalCaps {
  /** Notional of one open (USD) */
  orderUsd: number;
  /** Opened notional per series per UTC day (USD) */
  perSeriesUsd: number;
  /** Opened notional across all series per UTC day (USD) */
  dailyUsd: number;
}

export interface FeedHealth {
  /** Start of the reference feed outage, or null */
  readonly referenceUnavailableSince: number | null;
  /** Start of the series' outcome stream outage, or null */
  readonly contractDisconnectedSince: number | null;
}

export interface RiskInput {
  readonly series: SeriesId;
  readonly now: number;
  /** Active contract, or null when the series has none this tick */
  readonly contract: Contract | null;
  /** Candidate signal, or null when the tick produced none */
  readonly signal: Signal | null;
  readonly position: Position | null;
  /** Tradeable YES price, or null when the stream has no fresh quote */
  readonly markYesPrice: number | null;
  readonly feedHealth: FeedHealth;
}

export type RiskDecision =
  | { readonly type: 'no_op' }
  | { readonly type: 'hold' }
  | { readonly type: 'reject'; readonly reason: string }
  | { readonly type: 'open'; readonly side: PositionSide }
  | { readonly type: 'close'; readonly reason: PaperReason }
  | { readonly type: 'flip'; readonly side: PositionSide };

export const KillSwitchReasons = {
  MAX_REALIZED_LOSS: 'max_realized_loss',
  REFERENCE_UNAVAILABLE: 'reference_feed_unavailable',
  STREAM_DISCONNECTED: 'contract_stream_disconnected',
  REJECT_SPIKE: 'reject_spike',
} as const;

export const CapRejectReasons = {
  SERIES: 'series_cap_exceeded',
  DAILY: 'daily_cap_exceeded',
} as const;

// ============================================================================
// RiskManager Implementation
// ============================================================================

export class RiskManager {
  private readonly config: Omit<RiskManagerConfig, 'logger'>;
  private readonly logger: IStrategyLogger;

  constructor(
    private readonly state: RiskState,
    config: RiskManagerConfig
  ) {
    const { logger, ...limits } = config;
    this.config = limits;
    this.logger = logger ?? silentLogger;
  }

  /**
   * Decide the action for one series tick
   */
  evaluate(input: RiskInput): RiskDecision {
    const { series, now, position, signal } = input;

    this.checkKillConditions(input);
    const killSwitch = this.state.snapshot().killSwitch;

    if (position && input.markYesPrice !== null) {
      const pnl = unrealizedPnl(position, input.markYesPrice);
      if (pnl <= -this.config.stopLossUsd) {
        this.logger.warn(LogEvents.RISK_LIMIT_TRIGGERED, { series, slug: position.slug, pnl, reason: 'stop_loss' });
        return { type: 'close', reason: 'stop_loss' };
      }
      if (pnl >= this.config.takeProfitUsd) {
        this.logger.info(LogEvents.RISK_LIMIT_TRIGGERED, { series, slug: position.slug, pnl, reason: 'take_profit' });
        return { type: 'close', reason: 'take_profit' };
      }
    }

    if (position && input.contract && position.slug !== input.contract.slug) {
      return { type: 'close', reason: 'rollover' };
    }
    if (position && now >= position.expiry) {
      return { type: 'close', reason: 'expiry' };
    }

    if (!signal) {
      return position ? { type: 'hold' } : { type: 'no_op' };
    }

    if (!position) {
      if (signal.direction === 'FLAT') {
        return { type: 'no_op' };
      }
      if (killSwitch) {
        return this.reject(series, 'kill_switch', signal.edgeBps);
      }
      const capBreach = this.capBreach(series, now);
      if (capBreach) {
        return this.reject(series, capBreach, signal.edgeBps);
      }
      return { type: 'open', side: signal.direction };
    }

    if (signal.direction === 'FLAT' || signal.direction === position.side) {
      return { type: 'hold' };
    }

    const heldMs = now - position.entryTimestamp;
    if (heldMs < this.config.minHoldMs[series]) {
      return this.reject(series, 'min_hold', signal.edgeBps);
    }
    // Exit still happens; only the new leg is refused
    if (killSwitch || this.capBreach(series, now)) {
      return { type: 'close', reason: 'flip' };
    }
    return { type: 'flip', side: signal.direction };
  }

  /**
   * Add a realized fill to the cumulative total; latches the kill switch on
   * a loss-cap breach.
   */
  recordRealized(delta: number, now: number): number {
    const total = this.state.addRealized(delta);
    if (total <= -this.config.maxRealizedLossUsd) {
      this.activateKillSwitch(KillSwitchReasons.MAX_REALIZED_LOSS, now);
    }
    return total;
  }

  /**
   * Count an opened leg against the notional caps
   */
  recordOpened(series: SeriesId, notional: number, now: number): void {
    this.state.addOpened(series, notional, now);
  }

  openedNotional(series: SeriesId, now: number): OpenedNotional {
    return this.state.openedNotional(series, now);
  }

  /**
   * Latch the kill switch on a reject spike raised by telemetry
   */
  applyAlerts(alerts: TelemetryAlerts, now: number): void {
    if (alerts.rejectSpike) {
      this.activateKillSwitch(KillSwitchReasons.REJECT_SPIKE, now);
    }
  }

  activateKillSwitch(reason: string, now: number): void {
    if (this.state.latch(reason, now)) {
      this.logger.error(LogEvents.KILL_SWITCH_ACTIVATED, {
        reason,
        realizedPnl: this.state.snapshot().realizedPnl,
      });
    }
  }

  snapshot(): RiskStateSnapshot {
    return this.state.snapshot();
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private checkKillConditions(input: RiskInput): void {
    const { now, feedHealth } = input;
    const { fatalStalenessMs, maxRealizedLossUsd } = this.config;

    if (this.state.snapshot().realizedPnl <= -maxRealizedLossUsd) {
      this.activateKillSwitch(KillSwitchReasons.MAX_REALIZED_LOSS, now);
    }
    if (
      feedHealth.referenceUnavailableSince !== null &&
      now - feedHealth.referenceUnavailableSince > fatalStalenessMs
    ) {
      this.activateKillSwitch(KillSwitchReasons.REFERENCE_UNAVAILABLE, now);
    }
    if (
      feedHealth.contractDisconnectedSince !== null &&
      now - feedHealth.contractDisconnectedSince > fatalStalenessMs
    ) {
      this.activateKillSwitch(KillSwitchReasons.STREAM_DISCONNECTED, now);
    }
  }

  private capBreach(series: SeriesId, now: number): string | null {
    const caps = this.config.notionalCaps;
    if (!caps) {
      return null;
    }
    const opened = this.state.openedNotional(series, now);
    if (opened.series + caps.orderUsd > caps.perSeriesUsd) {
      return CapRejectReasons.SERIES;
    }
    if (opened.daily + caps.orderUsd > caps.dailyUsd) {
      return CapRejectReasons.DAILY;
    }
    return null;
  }

  private reject(series: SeriesId, reason: string, edgeBps: number): RiskDecision {
    this.logger.info(LogEvents.SIGNAL_REJECTED, { series, reason, edgeBps });
    return { type: 'reject', reason };
  }
}
