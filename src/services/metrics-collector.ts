/**
 * Metrics Collector
 *
 * Process-wide loop, submit and reject counters plus decision-to-submit
 * latency samples, summarized into each telemetry snapshot.
 */

import type { LatencySummary, TelemetryAlerts } from '../types/audit.types.js';

export interface MetricsSnapshot {
  readonly loops: number;
  readonly submits: number;
  readonly rejects: number;
  readonly skippedTicks: number;
  /** rejects / (submits + rejects), 0 when neither happened */
  readonly rejectRate: number;
  readonly decisionToSubmitMs: LatencySummary | null;
}

export interface AlertThresholds {
  /** Reject rate above which a reject spike is flagged (default: 0.1) */
  maxRejectRate: number;
  /** p95 latency above which a latency breach is flagged (default: 1200) */
  maxP95SubmitLatencyMs: number;
}

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  maxRejectRate: 0.1,
  maxP95SubmitLatencyMs: 1200,
};

/** Latency samples kept for percentile estimation */
const MAX_SAMPLES = 10_000;

/**
 * Nearest-rank percentile on sorted values, rounding the fractional index
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.round((p / 100) * (sorted.length - 1));
  return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

function median(sorted: readonly number[]): number {
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function summarizeLatency(samples: readonly number[]): LatencySummary | null {
  if (samples.length === 0) {
    return null;
  }
  const sorted = [...samples].sort((a, b) => a - b);
  return {
    p50: median(sorted),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

export function evaluateAlerts(
  snapshot: MetricsSnapshot,
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS
): TelemetryAlerts {
  const p95 = snapshot.decisionToSubmitMs?.p95 ?? 0;
  return {
    rejectSpike: snapshot.rejectRate > thresholds.maxRejectRate,
    p95LatencyBreach: p95 > thresholds.maxP95SubmitLatencyMs,
  };
}

export class MetricsCollector {
  private loops = 0;
  private submits = 0;
  private rejects = 0;
  private skippedTicks = 0;
  private latencies: number[] = [];

  recordLoop(): void {
    this.loops++;
  }

  recordSubmit(latencyMs: number): void {
    this.submits++;
    this.latencies.push(latencyMs);
    if (this.latencies.length > MAX_SAMPLES) {
      this.latencies = this.latencies.slice(-MAX_SAMPLES);
    }
  }

  recordReject(): void {
    this.rejects++;
  }

  /** A tick dropped because the previous one for the series was still running */
  recordSkippedTick(): void {
    this.skippedTicks++;
  }

  snapshot(): MetricsSnapshot {
    const decided = this.submits + this.rejects;
    return {
      loops: this.loops,
      submits: this.submits,
      rejects: this.rejects,
      skippedTicks: this.skippedTicks,
      rejectRate: decided > 0 ? this.rejects / decided : 0,
      decisionToSubmitMs: summarizeLatency(this.latencies),
    };
  }
}
