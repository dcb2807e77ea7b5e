/**
 * Probability Model
 *
 * Estimators mapping (spot, strike, seconds to expiry) to the probability
 * that the reference price finishes above the strike.
 *
 * Every estimator:
 * - is pure and stateless
 * - is monotonic non-decreasing in spot
 * - degenerates at expiry: 1 above the strike, 0 below, 0.5 on it
 */

// ============================================================================
// Types
// ============================================================================

export interface Estimator {
  /** Strategy tag, recorded with every estimate */
  readonly name: EstimatorKind;
  estimate(spot: number, strike: number, secondsToExpiry: number): number;
}

export type EstimatorKind = 'lognormal' | 'threshold';

export const VALID_ESTIMATOR_KINDS: readonly EstimatorKind[] = ['lognormal', 'threshold'] as const;

export interface EstimatorConfig {
  kind: EstimatorKind;
  /** Annualized volatility used by the lognormal estimator (default: 0.8) */
  sigmaAnnual?: number;
}

// ============================================================================
// Constants
// ============================================================================

/** Probability reported when spot sits exactly on the strike at expiry */
export const AT_STRIKE_PROBABILITY = 0.5;

const SECONDS_PER_YEAR = 365 * 24 * 3600;

/** Shortest horizon the lognormal estimator integrates over */
const MIN_HORIZON_SECONDS = 1;

const DEFAULT_SIGMA_ANNUAL = 0.8;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Outcome at expiry: the boundary every estimator converges to
 */
export function expiryOutcome(spot: number, strike: number): number {
  if (spot > strike) return 1;
  if (spot < strike) return 0;
  return AT_STRIKE_PROBABILITY;
}

/**
 * Error function, Abramowitz & Stegun 7.1.26 (|error| < 1.5e-7)
 */
export function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const poly =
    t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
  return sign * (1 - poly * Math.exp(-ax * ax));
}

export function normalCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function assertPositiveFinite(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive finite number, got ${value}`);
  }
}

// ============================================================================
// Estimators
// ============================================================================

/**
 * Driftless lognormal: P(S_T > K) = 1 - Φ(ln(K/S) / (σ√t))
 */
export class LognormalEstimator implements Estimator {
  readonly name = 'lognormal' as const;
  private readonly sigmaAnnual: number;

  constructor(sigmaAnnual: number = DEFAULT_SIGMA_ANNUAL) {
    assertPositiveFinite(sigmaAnnual, 'sigmaAnnual');
    this.sigmaAnnual = sigmaAnnual;
  }

  estimate(spot: number, strike: number, secondsToExpiry: number): number {
    assertPositiveFinite(spot, 'spot');
    assertPositiveFinite(strike, 'strike');

    if (!(secondsToExpiry > 0)) {
      return expiryOutcome(spot, strike);
    }
    if (spot === strike) {
      return AT_STRIKE_PROBABILITY;
    }

    const years = Math.max(secondsToExpiry, MIN_HORIZON_SECONDS) / SECONDS_PER_YEAR;
    const volT = this.sigmaAnnual * Math.sqrt(years);
    const z = Math.log(strike / spot) / volT;
    return clamp01(1 - normalCdf(z));
  }
}

/**
 * Step estimator: ignores distance and time, reports the expiry outcome
 */
export class ThresholdEstimator implements Estimator {
  readonly name = 'threshold' as const;

  estimate(spot: number, strike: number, _secondsToExpiry: number): number {
    assertPositiveFinite(spot, 'spot');
    assertPositiveFinite(strike, 'strike');
    return expiryOutcome(spot, strike);
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Select an estimator by configured kind
 */
export function createEstimator(config: EstimatorConfig): Estimator {
  switch (config.kind) {
    case 'lognormal':
      return new LognormalEstimator(config.sigmaAnnual);
    case 'threshold':
      return new ThresholdEstimator();
  }
}

export function isEstimatorKind(value: string): value is EstimatorKind {
  return (VALID_ESTIMATOR_KINDS as readonly string[]).includes(value);
}
