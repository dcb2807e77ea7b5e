/**
 * Edge Engine
 *
 * Compares model probability with the market YES price and proposes a
 * directional signal when the signed edge clears the threshold.
 *
 *   edgeBps = (modelProbability - marketYesPrice) * 10000
 *   edgeBps >= +threshold  => BUY_YES
 *   edgeBps <= -threshold  => BUY_NO
 *   otherwise              => FLAT
 */

import type { SeriesId, Signal, SignalDirection } from '../types/market.types.js';

// ============================================================================
// Constants
// ============================================================================

export const BPS_PER_UNIT = 10_000;

export const DEFAULT_EDGE_THRESHOLD_BPS = 800;

/** Decimal places kept on edge values; strips float noise like 799.9999999 */
const EDGE_PRECISION = 4;

// ============================================================================
// Helpers
// ============================================================================

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function computeEdgeBps(modelProbability: number, marketYesPrice: number): number {
  return roundTo((modelProbability - marketYesPrice) * BPS_PER_UNIT, EDGE_PRECISION);
}

// ============================================================================
// EdgeEngine Implementation
// ============================================================================

export class EdgeEngine {
  private readonly thresholdBps: number;

  constructor(thresholdBps: number = DEFAULT_EDGE_THRESHOLD_BPS) {
    if (!Number.isFinite(thresholdBps) || thresholdBps <= 0) {
      throw new Error(`Edge threshold must be a positive number of bps, got ${thresholdBps}`);
    }
    this.thresholdBps = thresholdBps;
  }

  /**
   * Evaluate one tick for a series
   *
   * @param timestamp - Tick time in ms
   */
  evaluate(
    series: SeriesId,
    modelProbability: number,
    marketYesPrice: number,
    timestamp: number
  ): Signal {
    const edgeBps = computeEdgeBps(modelProbability, marketYesPrice);
    return {
      series,
      direction: this.directionFor(edgeBps),
      edgeBps,
      timestamp,
    };
  }

  getThresholdBps(): number {
    return this.thresholdBps;
  }

  private directionFor(edgeBps: number): SignalDirection {
    if (edgeBps >= this.thresholdBps) {
      return 'BUY_YES';
    }
    if (edgeBps <= -this.thresholdBps) {
      return 'BUY_NO';
    }
    return 'FLAT';
  }
}
