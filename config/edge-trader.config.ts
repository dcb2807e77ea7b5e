/**
 * Edge Trader Configuration
 *
 * Configuration for the BTC up/down edge paper trader.
 * All values can be overridden via environment variables (or a local .env).
 *
 * Environment variables:
 * - EDGE_LOOP_INTERVAL_MS: Evaluation interval per series (default: 1000)
 * - EDGE_REFERENCE_POLL_MS: Spot price poll interval (default: 1000)
 * - EDGE_REFERENCE_MAX_STALENESS_MS: Spot quote age before the feed is unavailable (default: 10000)
 * - EDGE_MARKET_REFRESH_SEC: Minimum time between discovery queries (default: 5)
 * - EDGE_THRESHOLD_BPS: Edge needed for a signal (default: 800)
 * - EDGE_POSITION_SIZE_USD: Paper notional per position (default: 25)
 * - EDGE_STOP_LOSS_USD / EDGE_TAKE_PROFIT_USD: Per-position limits (default: 12 / 18)
 * - EDGE_MIN_HOLD_SEC_5M / EDGE_MIN_HOLD_SEC_15M: Minimum hold before a flip (default: 45 / 90)
 * - EDGE_SEED_5M_SLUG / EDGE_SEED_15M_SLUG: Fallback contract slugs (required)
 * - EDGE_SERIES_5M_PREFIX / EDGE_SERIES_15M_PREFIX: Series slug prefixes
 * - EDGE_MAX_REALIZED_LOSS_USD: Realized loss that latches the kill switch (default: 100)
 * - EDGE_FATAL_STALENESS_SEC: Feed outage that latches the kill switch (default: 60)
 * - EDGE_MAX_SERIES_NOTIONAL_USD: Notional opened per series per UTC day (default: 1000)
 * - EDGE_MAX_DAILY_NOTIONAL_USD: Notional opened across series per UTC day (default: 10000)
 * - EDGE_ESTIMATOR: 'lognormal' or 'threshold' (default: 'lognormal')
 * - EDGE_SIGMA_ANNUAL: Annualized volatility for the lognormal estimator (default: 0.8)
 * - EDGE_BINANCE_SYMBOL: Reference symbol (default: 'BTCUSDT')
 * - GAMMA_API_URL, CLOB_WS_URL, BINANCE_REST_URL: Endpoint overrides
 * - EDGE_AUDIT_PATH: JSONL audit file (default: './data/edge-trader/audit.jsonl')
 * - EDGE_AUDIT_SQLITE_ENABLED: Mirror the audit trail into SQLite (default: false)
 * - EDGE_AUDIT_SQLITE_PATH: SQLite file (default: './data/edge-trader/audit.db')
 * - EDGE_DEBUG: Enable debug logging (default: false)
 */

import 'dotenv/config';
import type { EdgeTraderConfig } from '../src/services/edge-trader-service.js';
import { VALID_ESTIMATOR_KINDS, isEstimatorKind } from '../src/strategies/probability-model.js';

export const edgeTraderConfig: EdgeTraderConfig = {
  // === Loop Timing ===
  loopIntervalMs: parseInt(process.env.EDGE_LOOP_INTERVAL_MS || '1000', 10),
  referencePollMs: parseInt(process.env.EDGE_REFERENCE_POLL_MS || '1000', 10),
  referenceMaxStalenessMs: parseInt(process.env.EDGE_REFERENCE_MAX_STALENESS_MS || '10000', 10),
  marketRefreshSec: parseFloat(process.env.EDGE_MARKET_REFRESH_SEC || '5'),

  // === Signal ===
  // Signal fires when |model - market| * 10000 >= thresholdBps
  thresholdBps: parseFloat(process.env.EDGE_THRESHOLD_BPS || '800'),
  estimator: process.env.EDGE_ESTIMATOR || 'lognormal',
  sigmaAnnual: parseFloat(process.env.EDGE_SIGMA_ANNUAL || '0.8'),

  // === Position Sizing & Limits ===
  positionSizeUsd: parseFloat(process.env.EDGE_POSITION_SIZE_USD || '25'),
  stopLossUsd: parseFloat(process.env.EDGE_STOP_LOSS_USD || '12'),
  takeProfitUsd: parseFloat(process.env.EDGE_TAKE_PROFIT_USD || '18'),
  maxRealizedLossUsd: parseFloat(process.env.EDGE_MAX_REALIZED_LOSS_USD || '100'),
  fatalStalenessSec: parseFloat(process.env.EDGE_FATAL_STALENESS_SEC || '60'),
  maxSeriesNotionalUsd: parseFloat(process.env.EDGE_MAX_SERIES_NOTIONAL_USD || '1000'),
  maxDailyNotionalUsd: parseFloat(process.env.EDGE_MAX_DAILY_NOTIONAL_USD || '10000'),

  // === Series ===
  series: {
    FIVE_MIN: {
      prefix: process.env.EDGE_SERIES_5M_PREFIX || 'btc-updown-5m',
      seedSlug: process.env.EDGE_SEED_5M_SLUG || '',
      minHoldSec: parseFloat(process.env.EDGE_MIN_HOLD_SEC_5M || '45'),
    },
    FIFTEEN_MIN: {
      prefix: process.env.EDGE_SERIES_15M_PREFIX || 'btc-updown-15m',
      seedSlug: process.env.EDGE_SEED_15M_SLUG || '',
      minHoldSec: parseFloat(process.env.EDGE_MIN_HOLD_SEC_15M || '90'),
    },
  },

  // === Endpoints ===
  binanceSymbol: process.env.EDGE_BINANCE_SYMBOL || 'BTCUSDT',
  gammaApiUrl: process.env.GAMMA_API_URL || 'https://gamma-api.polymarket.com',
  clobWsUrl: process.env.CLOB_WS_URL || 'wss://ws-subscriptions-clob.polymarket.com/ws/market',
  binanceRestUrl: process.env.BINANCE_REST_URL || 'https://api.binance.com',

  // === Audit ===
  audit: {
    jsonlPath: process.env.EDGE_AUDIT_PATH || './data/edge-trader/audit.jsonl',
    sqliteEnabled: process.env.EDGE_AUDIT_SQLITE_ENABLED === 'true',
    sqlitePath: process.env.EDGE_AUDIT_SQLITE_PATH || './data/edge-trader/audit.db',
  },

  // === Debug Mode ===
  debug: process.env.EDGE_DEBUG === 'true',
};

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Validate configuration and return any issues
 */
export function validateEdgeTraderConfig(config: EdgeTraderConfig): string[] {
  const issues: string[] = [];

  const positives: Array<[string, number]> = [
    ['loopIntervalMs', config.loopIntervalMs],
    ['referencePollMs', config.referencePollMs],
    ['referenceMaxStalenessMs', config.referenceMaxStalenessMs],
    ['marketRefreshSec', config.marketRefreshSec],
    ['thresholdBps', config.thresholdBps],
    ['positionSizeUsd', config.positionSizeUsd],
    ['stopLossUsd', config.stopLossUsd],
    ['takeProfitUsd', config.takeProfitUsd],
    ['maxRealizedLossUsd', config.maxRealizedLossUsd],
    ['fatalStalenessSec', config.fatalStalenessSec],
    ['maxSeriesNotionalUsd', config.maxSeriesNotionalUsd],
    ['maxDailyNotionalUsd', config.maxDailyNotionalUsd],
    ['sigmaAnnual', config.sigmaAnnual],
  ];
  for (const [name, value] of positives) {
    if (!isPositive(value)) {
      issues.push(`${name} must be positive`);
    }
  }

  if (!isEstimatorKind(config.estimator)) {
    issues.push(`estimator must be one of: ${VALID_ESTIMATOR_KINDS.join(', ')}`);
  }

  if (!config.series.FIVE_MIN.seedSlug) {
    issues.push('EDGE_SEED_5M_SLUG is required');
  }
  if (!config.series.FIFTEEN_MIN.seedSlug) {
    issues.push('EDGE_SEED_15M_SLUG is required');
  }

  for (const [id, series] of Object.entries(config.series)) {
    if (!series.prefix) {
      issues.push(`${id} prefix cannot be empty`);
    }
    if (!(series.minHoldSec >= 0)) {
      issues.push(`${id} minHoldSec must be zero or more`);
    }
    if (series.seedSlug && series.prefix && !series.seedSlug.startsWith(`${series.prefix}-`)) {
      issues.push(`${id} seed slug must start with ${series.prefix}-`);
    }
  }

  if (!config.binanceSymbol) {
    issues.push('binanceSymbol cannot be empty');
  }

  return issues;
}

export default edgeTraderConfig;
