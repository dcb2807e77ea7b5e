/**
 * TelemetryAudit Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { JsonlAuditSink, TelemetryAudit, type TelemetryInputs } from './telemetry-audit.js';
import { MemoryAuditSink, TEST_WINDOW_START } from '../persistence/test-fixtures.js';
import type { AuditRecord, AuditSink, MarketRollRecord } from '../types/audit.types.js';
import type { IStrategyLogger } from '../utils/strategy-logger.js';

// ============================================================================
// Test Utilities
// ============================================================================

const NOW = TEST_WINDOW_START + 1000;

const ROLL: MarketRollRecord = {
  kind: 'market_roll',
  timestamp: new Date(NOW).toISOString(),
  series: 'FIVE_MIN',
  slug: 'btc-updown-5m-1771549800',
  previousSlug: null,
  conditionId: '0xtest-condition',
  yesTokenId: 'tok-yes',
  strike: 66900,
  expiry: new Date(TEST_WINDOW_START + 300_000).toISOString(),
};

function createLogger(): IStrategyLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), isEnabled: () => true };
}

function inputs(overrides: Partial<TelemetryInputs> = {}): TelemetryInputs {
  return {
    ledger: { realizedPnl: 12.5, unrealizedPnl: -2.5, openPositions: 1 },
    risk: { killSwitch: false, killSwitchReason: null, killSwitchActivatedAt: null, realizedPnl: 12.5 },
    metrics: {
      loops: 10,
      submits: 4,
      rejects: 0,
      skippedTicks: 1,
      rejectRate: 0,
      decisionToSubmitMs: { p50: 2, p95: 4, p99: 4 },
    },
    ...overrides,
  };
}

class FailingSink implements AuditSink {
  append(_record: AuditRecord): void {
    throw new Error('disk full');
  }

  async close(): Promise<void> {
    throw new Error('already gone');
  }
}

// ============================================================================
// TelemetryAudit
// ============================================================================

describe('TelemetryAudit', () => {
  let sink: MemoryAuditSink;
  let logger: IStrategyLogger;
  let audit: TelemetryAudit;

  beforeEach(() => {
    sink = new MemoryAuditSink();
    logger = createLogger();
    audit = new TelemetryAudit([sink], { snapshotIntervalMs: 1000, now: () => NOW, logger });
  });

  it('should append records to every sink', () => {
    const second = new MemoryAuditSink();
    const fanout = new TelemetryAudit([sink, second], { snapshotIntervalMs: 1000 });

    fanout.append(ROLL);

    expect(sink.records).toEqual([ROLL]);
    expect(second.records).toEqual([ROLL]);
  });

  it('should keep writing to healthy sinks when one fails', () => {
    const fanout = new TelemetryAudit([new FailingSink(), sink], { snapshotIntervalMs: 1000, logger });

    expect(() => fanout.append(ROLL)).not.toThrow();
    expect(sink.records).toEqual([ROLL]);
    expect(logger.error).toHaveBeenCalledWith('audit_sink_error', { error: 'disk full', message: 'market_roll' });
  });

  it('should build a telemetry snapshot across all series', () => {
    const record = audit.snapshot(inputs());

    expect(record).toEqual({
      kind: 'telemetry_snapshot',
      timestamp: new Date(NOW).toISOString(),
      series: 'ALL',
      realizedPnl: 12.5,
      unrealizedPnl: -2.5,
      totalPnl: 10,
      openPositions: 1,
      killSwitch: false,
      killSwitchReason: null,
      loops: 10,
      submits: 4,
      rejects: 0,
      skippedTicks: 1,
      rejectRate: 0,
      decisionToSubmitMs: { p50: 2, p95: 4, p99: 4 },
      alerts: { rejectSpike: false, p95LatencyBreach: false },
    });
    expect(sink.records).toEqual([record]);
  });

  it('should flag and log alerts', () => {
    const record = audit.snapshot(
      inputs({
        metrics: {
          loops: 10,
          submits: 1,
          rejects: 1,
          skippedTicks: 0,
          rejectRate: 0.5,
          decisionToSubmitMs: { p50: 1500, p95: 1500, p99: 1500 },
        },
      })
    );

    expect(record.alerts).toEqual({ rejectSpike: true, p95LatencyBreach: true });
    expect(logger.warn).toHaveBeenCalledWith('telemetry_alert', { reason: 'reject_spike', message: 'reject rate 0.5' });
    expect(logger.warn).toHaveBeenCalledWith('telemetry_alert', {
      reason: 'p95_latency',
      message: 'p95 decision-to-submit 1500ms',
    });
  });

  it('should carry the kill switch state', () => {
    const record = audit.snapshot(
      inputs({
        risk: {
          killSwitch: true,
          killSwitchReason: 'max_realized_loss',
          killSwitchActivatedAt: NOW,
          realizedPnl: -100,
        },
      })
    );

    expect(record.killSwitch).toBe(true);
    expect(record.killSwitchReason).toBe('max_realized_loss');
  });

  it('should hand raised alerts to the alert callback only', () => {
    const onAlerts = vi.fn();
    const alerting = new TelemetryAudit([sink], { snapshotIntervalMs: 1000, now: () => NOW, onAlerts });

    alerting.snapshot(inputs());
    alerting.snapshot(
      inputs({
        metrics: {
          loops: 10,
          submits: 3,
          rejects: 1,
          skippedTicks: 0,
          rejectRate: 0.25,
          decisionToSubmitMs: { p50: 2, p95: 4, p99: 4 },
        },
      })
    );

    expect(onAlerts).toHaveBeenCalledTimes(1);
    expect(onAlerts).toHaveBeenCalledWith({ rejectSpike: true, p95LatencyBreach: false });
  });

  describe('timer', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should emit snapshots on its own interval until closed', async () => {
      const source = vi.fn(() => inputs());
      audit.start(source);

      vi.advanceTimersByTime(3000);
      await audit.close();
      vi.advanceTimersByTime(3000);

      expect(source).toHaveBeenCalledTimes(3);
      expect(sink.kinds()).toEqual(['telemetry_snapshot', 'telemetry_snapshot', 'telemetry_snapshot']);
      expect(sink.closed).toBe(true);
    });

    it('should log a failing source and keep running', () => {
      const source = vi
        .fn<() => TelemetryInputs>()
        .mockImplementationOnce(() => {
          throw new Error('ledger busy');
        })
        .mockImplementation(() => inputs());
      audit.start(source);

      vi.advanceTimersByTime(2000);
      audit.stop();

      expect(logger.error).toHaveBeenCalledWith('error', { error: 'ledger busy', reason: 'telemetry_snapshot' });
      expect(sink.records).toHaveLength(1);
    });
  });

  it('should drop appends after close', async () => {
    await audit.close();
    audit.append(ROLL);

    expect(sink.records).toHaveLength(0);
    expect(logger.warn).toHaveBeenCalledWith('audit_sink_error', { reason: 'closed', message: 'market_roll' });
  });

  it('should log sink close failures', async () => {
    const fanout = new TelemetryAudit([new FailingSink(), sink], { snapshotIntervalMs: 1000, logger });

    await fanout.close();

    expect(sink.closed).toBe(true);
    expect(logger.error).toHaveBeenCalledWith('audit_sink_error', { error: 'already gone', reason: 'close' });
  });
});

// ============================================================================
// JsonlAuditSink
// ============================================================================

describe('JsonlAuditSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'edge-audit-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write one JSON object per line and append across instances', async () => {
    const path = join(dir, 'nested', 'audit.jsonl');

    const first = new JsonlAuditSink(path);
    first.append(ROLL);
    await first.close();

    const second = new JsonlAuditSink(path);
    second.append({ ...ROLL, slug: 'btc-updown-5m-1771550100', previousSlug: 'btc-updown-5m-1771549800' });
    await second.close();

    const lines = readFileSync(path, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(ROLL);
    expect(JSON.parse(lines[1])).toMatchObject({ kind: 'market_roll', previousSlug: 'btc-updown-5m-1771549800' });
  });

  it('should refuse appends after close', async () => {
    const sink = new JsonlAuditSink(join(dir, 'audit.jsonl'));
    await sink.close();

    expect(() => sink.append(ROLL)).toThrow('is closed');
  });
});
