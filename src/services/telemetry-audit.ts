/**
 * Telemetry Audit
 *
 * Append-only audit trail. Fans every record out to the configured sinks
 * (JSONL file always, SQLite mirror optionally) and emits a periodic
 * telemetry_snapshot on its own timer. A failing sink is logged and never
 * reaches the caller.
 */

import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import type { AuditRecord, AuditSink, TelemetryAlerts, TelemetrySnapshotRecord } from '../types/audit.types.js';
import type { LedgerSnapshot } from './paper-execution-engine.js';
import type { RiskStateSnapshot } from './risk-manager.js';
import {
  DEFAULT_ALERT_THRESHOLDS,
  evaluateAlerts,
  type AlertThresholds,
  type MetricsSnapshot,
} from './metrics-collector.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { getErrorMessage } from '../utils/trader-error.js';

// ============================================================================
// JSONL Sink
// ============================================================================

/**
 * One JSON object per line, appended to a file
 */
export class JsonlAuditSink implements AuditSink {
  private readonly stream: WriteStream;
  private closing: Promise<void> | null = null;

  constructor(
    readonly path: string,
    logger: IStrategyLogger = silentLogger
  ) {
    mkdirSync(dirname(path), { recursive: true });
    this.stream = createWriteStream(path, { flags: 'a', encoding: 'utf-8' });
    this.stream.on('error', (error) => {
      logger.error(LogEvents.AUDIT_SINK_ERROR, { path, error: error.message });
    });
  }

  append(record: AuditRecord): void {
    if (this.closing) {
      throw new Error(`Audit sink ${this.path} is closed`);
    }
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = new Promise((resolve) => {
        if (this.stream.destroyed) {
          resolve();
          return;
        }
        this.stream.once('close', () => resolve());
        this.stream.end();
      });
    }
    return this.closing;
  }
}

// ============================================================================
// Types
// ============================================================================

export interface TelemetryInputs {
  readonly ledger: LedgerSnapshot;
  readonly risk: RiskStateSnapshot;
  readonly metrics: MetricsSnapshot;
}

/** Collects the current state for a telemetry snapshot */
export type TelemetrySource = () => TelemetryInputs;

export interface TelemetryAuditConfig {
  /** Interval between telemetry snapshots (ms) */
  snapshotIntervalMs: number;
  alertThresholds?: AlertThresholds;
  /** Called with the alerts of every snapshot that raised one */
  onAlerts?: (alerts: TelemetryAlerts) => void;
  /** Clock (default: Date.now) */
  now?: () => number;
  logger?: IStrategyLogger;
}

// ============================================================================
// TelemetryAudit Implementation
// ============================================================================

export class TelemetryAudit implements AuditSink {
  private readonly snapshotIntervalMs: number;
  private readonly alertThresholds: AlertThresholds;
  private readonly onAlerts: ((alerts: TelemetryAlerts) => void) | undefined;
  private readonly now: () => number;
  private readonly logger: IStrategyLogger;
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(
    private readonly sinks: readonly AuditSink[],
    config: TelemetryAuditConfig
  ) {
    this.snapshotIntervalMs = config.snapshotIntervalMs;
    this.alertThresholds = config.alertThresholds ?? DEFAULT_ALERT_THRESHOLDS;
    this.onAlerts = config.onAlerts;
    this.now = config.now ?? (() => Date.now());
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Append a record to every sink
   */
  append(record: AuditRecord): void {
    if (this.closed) {
      this.logger.warn(LogEvents.AUDIT_SINK_ERROR, { reason: 'closed', message: record.kind });
      return;
    }
    for (const sink of this.sinks) {
      try {
        sink.append(record);
      } catch (error) {
        this.logger.error(LogEvents.AUDIT_SINK_ERROR, { error: getErrorMessage(error), message: record.kind });
      }
    }
  }

  /**
   * Build, append and return a telemetry snapshot
   */
  snapshot(inputs: TelemetryInputs): TelemetrySnapshotRecord {
    const { ledger, risk, metrics } = inputs;
    const alerts = evaluateAlerts(metrics, this.alertThresholds);

    const record: TelemetrySnapshotRecord = {
      kind: 'telemetry_snapshot',
      timestamp: new Date(this.now()).toISOString(),
      series: 'ALL',
      realizedPnl: ledger.realizedPnl,
      unrealizedPnl: ledger.unrealizedPnl,
      totalPnl: ledger.realizedPnl + ledger.unrealizedPnl,
      openPositions: ledger.openPositions,
      killSwitch: risk.killSwitch,
      killSwitchReason: risk.killSwitchReason,
      loops: metrics.loops,
      submits: metrics.submits,
      rejects: metrics.rejects,
      skippedTicks: metrics.skippedTicks,
      rejectRate: metrics.rejectRate,
      decisionToSubmitMs: metrics.decisionToSubmitMs,
      alerts,
    };
    this.append(record);

    if (alerts.rejectSpike) {
      this.logger.warn(LogEvents.TELEMETRY_ALERT, { reason: 'reject_spike', message: `reject rate ${metrics.rejectRate}` });
    }
    if (alerts.p95LatencyBreach) {
      this.logger.warn(LogEvents.TELEMETRY_ALERT, {
        reason: 'p95_latency',
        message: `p95 decision-to-submit ${metrics.decisionToSubmitMs?.p95 ?? 0}ms`,
      });
    }
    if (this.onAlerts && (alerts.rejectSpike || alerts.p95LatencyBreach)) {
      this.onAlerts(alerts);
    }
    return record;
  }

  /**
   * Emit a snapshot on every interval
   */
  start(source: TelemetrySource): void {
    if (this.timer || this.closed) {
      return;
    }
    this.timer = setInterval(() => {
      try {
        this.snapshot(source());
      } catch (error) {
        this.logger.error(LogEvents.ERROR, { error: getErrorMessage(error), reason: 'telemetry_snapshot' });
      }
    }, this.snapshotIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Stop the timer, then flush and close every sink
   */
  async close(): Promise<void> {
    this.stop();
    if (this.closed) {
      return;
    }
    this.closed = true;

    const results = await Promise.allSettled(this.sinks.map((sink) => sink.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(LogEvents.AUDIT_SINK_ERROR, { error: getErrorMessage(result.reason), reason: 'close' });
      }
    }
  }
}
