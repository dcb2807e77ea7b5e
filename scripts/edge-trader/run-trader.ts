#!/usr/bin/env npx tsx
/**
 * Edge Trader Runner
 *
 * Entry point for the BTC up/down edge paper trader with structured JSON
 * logging. Configuration comes from the environment; see
 * config/edge-trader.config.ts for every key.
 *
 * Usage:
 *   npx tsx scripts/edge-trader/run-trader.ts
 *
 * Required:
 *   EDGE_SEED_5M_SLUG - Fallback 5m contract slug
 *   EDGE_SEED_15M_SLUG - Fallback 15m contract slug
 */

import { edgeTraderConfig, validateEdgeTraderConfig } from '../../config/edge-trader.config.js';
import { EdgeTraderService } from '../../src/services/edge-trader-service.js';
import { LogEvents, createEdgeTraderLogger } from '../../src/utils/strategy-logger.js';
import { getErrorMessage, isTraderError } from '../../src/utils/trader-error.js';

const logger = createEdgeTraderLogger();

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const config = edgeTraderConfig;

  const issues = validateEdgeTraderConfig(config);
  if (issues.length > 0) {
    logger.error(LogEvents.CONFIG_INVALID, { issues });
    process.exit(1);
  }

  logger.info(LogEvents.CONFIG_LOADED, {
    message: `estimator=${config.estimator} threshold=${config.thresholdBps}bps size=$${config.positionSizeUsd}`,
    path: config.audit.jsonlPath,
  });

  const trader = new EdgeTraderService(config, { logger });
  await trader.start();

  // Handle shutdown signals
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(LogEvents.TRADER_STOPPED, { reason: signal, message: 'shutdown initiated' });

    try {
      await trader.stop();
      process.exit(0);
    } catch (error) {
      logger.error(LogEvents.ERROR, { reason: 'shutdown', error: getErrorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  logger.error(LogEvents.ERROR, {
    reason: 'fatal',
    error: getErrorMessage(error),
    errorCode: isTraderError(error) ? error.code : undefined,
  });
  process.exit(1);
});
