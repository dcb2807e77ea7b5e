/**
 * Audit Record Types
 *
 * Closed union of every record the audit trail accepts. Each variant carries
 * its own required fields; `kind` is the discriminator written to the sink.
 */

import type { PositionSide, SeriesId, SignalDirection } from './market.types.js';

/** Series tag for records that summarize every series */
export type AuditSeriesTag = SeriesId | 'ALL';

interface AuditRecordBase {
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  readonly series: AuditSeriesTag;
}

export interface MarketRollRecord extends AuditRecordBase {
  readonly kind: 'market_roll';
  readonly series: SeriesId;
  readonly slug: string;
  /** Slug of the retired contract, null on first resolution */
  readonly previousSlug: string | null;
  readonly conditionId: string;
  readonly yesTokenId: string;
  readonly strike: number;
  /** ISO 8601 expiry */
  readonly expiry: string;
}

/** Outcome of a single pipeline tick */
export type SnapshotDecision =
  | 'skip'
  | 'no_op'
  | 'hold'
  | 'open'
  | 'close'
  | 'flip'
  | 'reject';

export interface SeriesSnapshotRecord extends AuditRecordBase {
  readonly kind: 'series_snapshot';
  readonly series: SeriesId;
  readonly slug: string | null;
  /** Estimator that priced the tick */
  readonly estimator: string;
  readonly spot: number | null;
  readonly strike: number | null;
  readonly marketYesPrice: number | null;
  readonly modelProbability: number | null;
  readonly edgeBps: number | null;
  readonly secondsToExpiry: number | null;
  readonly signal: SignalDirection | null;
  readonly decision: SnapshotDecision;
  /** Skip or reject reason */
  readonly reason?: string;
}

export type PaperAction = 'open' | 'close';

/** Why a paper order was submitted */
export type PaperReason =
  | 'signal'
  | 'flip'
  | 'stop_loss'
  | 'take_profit'
  | 'expiry'
  | 'rollover'
  | 'shutdown';

export interface PaperSubmitRecord extends AuditRecordBase {
  readonly kind: 'paper_submit';
  readonly series: SeriesId;
  readonly slug: string;
  readonly action: PaperAction;
  readonly reason: PaperReason;
  readonly side: PositionSide;
  /** Fill price of the held outcome token */
  readonly price: number;
  readonly size: number;
  readonly notionalUsd: number;
  /** Realized PnL of this fill (0 for opens) */
  readonly realizedPnlDelta: number;
  /** Cumulative realized PnL after the fill */
  readonly realizedPnlTotal: number;
  /** Unrealized PnL of the series position after the fill */
  readonly unrealizedPnl: number;
}

export interface LatencySummary {
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
}

export interface TelemetryAlerts {
  /** Reject rate above the configured ceiling */
  readonly rejectSpike: boolean;
  /** p95 decision-to-submit latency above the configured ceiling */
  readonly p95LatencyBreach: boolean;
}

export interface TelemetrySnapshotRecord extends AuditRecordBase {
  readonly kind: 'telemetry_snapshot';
  readonly series: 'ALL';
  readonly realizedPnl: number;
  readonly unrealizedPnl: number;
  readonly totalPnl: number;
  readonly openPositions: number;
  readonly killSwitch: boolean;
  readonly killSwitchReason: string | null;
  readonly loops: number;
  readonly submits: number;
  readonly rejects: number;
  readonly skippedTicks: number;
  readonly rejectRate: number;
  readonly decisionToSubmitMs: LatencySummary | null;
  readonly alerts: TelemetryAlerts;
}

export type AuditRecord =
  | MarketRollRecord
  | SeriesSnapshotRecord
  | PaperSubmitRecord
  | TelemetrySnapshotRecord;

export type AuditRecordKind = AuditRecord['kind'];

export const AUDIT_RECORD_KINDS: readonly AuditRecordKind[] = [
  'market_roll',
  'series_snapshot',
  'paper_submit',
  'telemetry_snapshot',
] as const;

/**
 * Destination for audit records.
 * Implementations only ever append.
 */
export interface AuditSink {
  append(record: AuditRecord): void;
  /** Flush pending writes and release resources */
  close(): Promise<void>;
}

/** Append-only view of a sink, handed to components that only write */
export type AuditWriter = Pick<AuditSink, 'append'>;
