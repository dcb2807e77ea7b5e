/**
 * Paper Execution Engine
 *
 * Holds the paper position ledger (at most one position per series) and
 * applies RiskManager decisions to it. Every action is all-or-nothing:
 * prices are validated before the ledger changes, the ledger is committed,
 * then one paper_submit record per leg is appended. A flip is a close and an
 * open committed together.
 *
 * Prices are YES prices; positions hold the outcome token of their side, so
 * a BUY_NO fill is priced at 1 - YES. Realized PnL is reported to the
 * RiskManager, which owns the cumulative total.
 */

import {
  SERIES_IDS,
  tokenPrice,
  unrealizedPnl,
  type ContractRef,
  type Position,
  type PositionSide,
  type SeriesId,
} from '../types/market.types.js';
import type { AuditWriter, PaperReason, PaperSubmitRecord } from '../types/audit.types.js';
import type { RiskManager } from './risk-manager.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { TraderError, TraderErrorCode } from '../utils/trader-error.js';

// ============================================================================
// Types
// ============================================================================

export interface PaperExecutionConfig {
  /** Fixed paper notional per open (USD) */
  notionalUsd: number;
  /** Clock (default: Date.now) */
  now?: () => number;
  logger?: IStrategyLogger;
}

export interface LedgerSnapshot {
  readonly realizedPnl: number;
  readonly unrealizedPnl: number;
  readonly openPositions: number;
}

/** Mark YES prices per series for unrealized PnL */
export type SeriesMarks = Partial<Record<SeriesId, number>>;

/** Fill prices are clamped into this range */
export const MIN_FILL_PRICE = 0.0001;
export const MAX_FILL_PRICE = 0.9999;

export function clampFillPrice(price: number): number {
  return Math.min(MAX_FILL_PRICE, Math.max(MIN_FILL_PRICE, price));
}

interface Leg {
  readonly action: 'open' | 'close';
  readonly reason: PaperReason;
  readonly position: Position;
  readonly price: number;
  readonly realizedPnlDelta: number;
}

// ============================================================================
// PaperExecutionEngine Implementation
// ============================================================================

export class PaperExecutionEngine {
  private readonly positions = new Map<SeriesId, Position>();
  private readonly marks = new Map<SeriesId, number>();
  private readonly notionalUsd: number;
  private readonly now: () => number;
  private readonly logger: IStrategyLogger;

  constructor(
    private readonly risk: RiskManager,
    private readonly audit: AuditWriter,
    config: PaperExecutionConfig
  ) {
    if (!Number.isFinite(config.notionalUsd) || config.notionalUsd <= 0) {
      throw new Error(`Paper notional must be a positive number, got ${config.notionalUsd}`);
    }
    this.notionalUsd = config.notionalUsd;
    this.now = config.now ?? (() => Date.now());
    this.logger = config.logger ?? silentLogger;
  }

  getPosition(series: SeriesId): Position | null {
    return this.positions.get(series) ?? null;
  }

  openPositions(): Position[] {
    return [...this.positions.values()];
  }

  /**
   * Open a position on an empty series
   */
  open(series: SeriesId, contract: ContractRef, side: PositionSide, markYesPrice: number): PaperSubmitRecord[] {
    assertYesPrice(markYesPrice);
    if (this.positions.has(series)) {
      throw new Error(`Series ${series} already has an open position`);
    }
    const now = this.now();
    return this.commit(series, markYesPrice, [this.openLeg(series, contract, side, markYesPrice, now, 'signal')]);
  }

  /**
   * Close the series position, if any
   */
  close(series: SeriesId, markYesPrice: number, reason: PaperReason): PaperSubmitRecord[] {
    assertYesPrice(markYesPrice);
    const position = this.positions.get(series);
    if (!position) {
      return [];
    }
    return this.commit(series, markYesPrice, [this.closeLeg(position, markYesPrice, reason)]);
  }

  /**
   * Close the series position and open the opposite side in one step
   */
  flip(series: SeriesId, contract: ContractRef, side: PositionSide, markYesPrice: number): PaperSubmitRecord[] {
    assertYesPrice(markYesPrice);
    const position = this.positions.get(series);
    if (!position) {
      throw new Error(`Series ${series} has no position to flip`);
    }
    if (position.side === side) {
      throw new Error(`Series ${series} position is already ${side}`);
    }
    const now = this.now();
    return this.commit(series, markYesPrice, [
      this.closeLeg(position, markYesPrice, 'flip'),
      this.openLeg(series, contract, side, markYesPrice, now, 'flip'),
    ]);
  }

  /**
   * Realized and unrealized PnL across all series. Marks are remembered, so
   * a series without a fresh mark is valued at its last one.
   */
  snapshot(marks: SeriesMarks = {}): LedgerSnapshot {
    for (const series of SERIES_IDS) {
      const mark = marks[series];
      if (mark !== undefined && Number.isFinite(mark)) {
        this.marks.set(series, mark);
      }
    }

    let unrealized = 0;
    for (const [series, position] of this.positions) {
      const mark = this.marks.get(series);
      if (mark !== undefined) {
        unrealized += unrealizedPnl(position, mark);
      }
    }

    return {
      realizedPnl: this.risk.snapshot().realizedPnl,
      unrealizedPnl: unrealized,
      openPositions: this.positions.size,
    };
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private openLeg(
    series: SeriesId,
    contract: ContractRef,
    side: PositionSide,
    markYesPrice: number,
    now: number,
    reason: PaperReason
  ): Leg {
    const price = clampFillPrice(tokenPrice(side, markYesPrice));
    const position: Position = {
      series,
      slug: contract.slug,
      side,
      entryPrice: price,
      entryTimestamp: now,
      expiry: contract.expiry,
      size: this.notionalUsd / price,
    };
    return { action: 'open', reason, position, price, realizedPnlDelta: 0 };
  }

  private closeLeg(position: Position, markYesPrice: number, reason: PaperReason): Leg {
    const price = clampFillPrice(tokenPrice(position.side, markYesPrice));
    return {
      action: 'close',
      reason,
      position,
      price,
      realizedPnlDelta: (price - position.entryPrice) * position.size,
    };
  }

  private commit(series: SeriesId, markYesPrice: number, legs: readonly Leg[]): PaperSubmitRecord[] {
    const now = this.now();
    const timestamp = new Date(now).toISOString();

    // Ledger first
    const totals: number[] = [];
    for (const leg of legs) {
      if (leg.action === 'open') {
        this.positions.set(series, leg.position);
        this.risk.recordOpened(series, this.notionalUsd, now);
        totals.push(this.risk.snapshot().realizedPnl);
      } else {
        this.positions.delete(series);
        totals.push(this.risk.recordRealized(leg.realizedPnlDelta, now));
      }
    }
    this.marks.set(series, markYesPrice);

    const held = this.positions.get(series);
    const seriesUnrealized = held ? unrealizedPnl(held, markYesPrice) : 0;

    // Then the audit trail
    return legs.map((leg, index) => {
      const record: PaperSubmitRecord = {
        kind: 'paper_submit',
        timestamp,
        series,
        slug: leg.position.slug,
        action: leg.action,
        reason: leg.reason,
        side: leg.position.side,
        price: leg.price,
        size: leg.position.size,
        notionalUsd: leg.action === 'open' ? this.notionalUsd : leg.price * leg.position.size,
        realizedPnlDelta: leg.realizedPnlDelta,
        realizedPnlTotal: totals[index],
        unrealizedPnl: leg.action === 'open' ? seriesUnrealized : 0,
      };
      this.audit.append(record);
      this.logger.info(leg.action === 'open' ? LogEvents.PAPER_OPEN : LogEvents.PAPER_CLOSE, {
        series,
        slug: record.slug,
        side: record.side,
        price: record.price,
        size: record.size,
        pnl: record.realizedPnlDelta,
        realizedPnl: record.realizedPnlTotal,
        reason: record.reason,
      });
      return record;
    });
  }
}

function assertYesPrice(price: number): void {
  if (!Number.isFinite(price) || price < 0 || price > 1) {
    throw new TraderError(`YES price must be within [0, 1], got ${price}`, TraderErrorCode.INVALID_PRICE);
  }
}
