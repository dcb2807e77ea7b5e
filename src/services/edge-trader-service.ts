/**
 * EdgeTraderService
 *
 * Builds every component from configuration and owns all timers: the
 * reference poll, one evaluation loop per series, and the telemetry
 * snapshot. stop() clears the timers, waits for in-flight ticks, closes any
 * open paper positions and flushes the audit sinks.
 *
 * Events:
 * - started
 * - stopped (LedgerSnapshot)
 */

import { EventEmitter } from 'events';
import type { AuditSink } from '../types/audit.types.js';
import { SERIES_IDS, type SeriesDefinition, type SeriesId } from '../types/market.types.js';
import { BinanceSpotClient, type SpotPriceSource } from '../clients/binance-spot-client.js';
import { GammaMarketsClient, type MarketDiscoverySource } from '../clients/gamma-markets-client.js';
import { EdgeEngine } from '../strategies/edge-engine.js';
import { createEstimator, isEstimatorKind } from '../strategies/probability-model.js';
import { AuditRepository } from '../persistence/audit-repository.js';
import { MarketResolver } from './market-resolver.js';
import { ContractPriceStream, type PriceSubscriptionFactory } from './contract-price-stream.js';
import { ReferencePriceFeed } from './reference-price-feed.js';
import { RiskManager, RiskState, type RiskStateSnapshot } from './risk-manager.js';
import { PaperExecutionEngine, type LedgerSnapshot, type SeriesMarks } from './paper-execution-engine.js';
import { MetricsCollector, type AlertThresholds } from './metrics-collector.js';
import { JsonlAuditSink, TelemetryAudit, type TelemetryInputs } from './telemetry-audit.js';
import { SeriesPipeline } from './series-pipeline.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { TraderError, TraderErrorCode, getErrorMessage } from '../utils/trader-error.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface SeriesConfig {
  /** Slug prefix shared by every contract of the series */
  prefix: string;
  /** Slug used when discovery returns no live window */
  seedSlug: string;
  /** Minimum hold before a flip (seconds) */
  minHoldSec: number;
}

export interface AuditConfig {
  /** JSONL audit file */
  jsonlPath: string;
  /** Mirror records into SQLite */
  sqliteEnabled: boolean;
  sqlitePath: string;
}

export interface EdgeTraderConfig {
  /** Evaluation loop interval per series (ms) */
  loopIntervalMs: number;
  /** Reference price poll interval (ms) */
  referencePollMs: number;
  /** Reference quote age after which the feed is unavailable (ms) */
  referenceMaxStalenessMs: number;
  /** Minimum time between discovery queries per series (s) */
  marketRefreshSec: number;
  /** Edge threshold for a signal (bps) */
  thresholdBps: number;
  /** Paper notional per position (USD) */
  positionSizeUsd: number;
  stopLossUsd: number;
  takeProfitUsd: number;
  /** Cumulative realized loss that latches the kill switch (USD) */
  maxRealizedLossUsd: number;
  /** Feed outage that latches the kill switch (s) */
  fatalStalenessSec: number;
  /** Notional opened per series per UTC day (USD) */
  maxSeriesNotionalUsd: number;
  /** Notional opened across all series per UTC day (USD) */
  maxDailyNotionalUsd: number;
  /** 'lognormal' | 'threshold' */
  estimator: string;
  sigmaAnnual: number;
  binanceSymbol: string;
  gammaApiUrl: string;
  clobWsUrl: string;
  binanceRestUrl: string;
  series: Record<SeriesId, SeriesConfig>;
  audit: AuditConfig;
  alertThresholds?: AlertThresholds;
  debug: boolean;
}

/**
 * Transports and sinks, replaceable for tests
 */
export interface EdgeTraderDependencies {
  discovery: MarketDiscoverySource;
  spotSource: SpotPriceSource;
  createSubscription: PriceSubscriptionFactory;
  /** Replaces the configured JSONL/SQLite sinks */
  auditSinks: AuditSink[];
  now: () => number;
  logger: IStrategyLogger;
}

// ============================================================================
// Series Definitions
// ============================================================================

const SERIES_WINDOWS: Record<SeriesId, { label: string; windowMs: number }> = {
  FIVE_MIN: { label: '5m', windowMs: 5 * 60 * 1000 },
  FIFTEEN_MIN: { label: '15m', windowMs: 15 * 60 * 1000 },
};

export function buildSeriesDefinitions(config: EdgeTraderConfig): SeriesDefinition[] {
  return SERIES_IDS.map((id) => ({
    id,
    label: SERIES_WINDOWS[id].label,
    slugPrefix: config.series[id].prefix,
    windowMs: SERIES_WINDOWS[id].windowMs,
    minHoldMs: config.series[id].minHoldSec * 1000,
    seedSlug: config.series[id].seedSlug,
  }));
}

// ============================================================================
// Runtime
// ============================================================================

interface Runtime {
  readonly telemetry: TelemetryAudit;
  readonly stream: ContractPriceStream;
  readonly feed: ReferencePriceFeed;
  readonly engine: PaperExecutionEngine;
  readonly metrics: MetricsCollector;
  readonly pipelines: readonly SeriesPipeline[];
  readonly timers: NodeJS.Timeout[];
}

// ============================================================================
// EdgeTraderService Implementation
// ============================================================================

export class EdgeTraderService extends EventEmitter {
  private readonly config: EdgeTraderConfig;
  private readonly deps: Partial<EdgeTraderDependencies>;
  private readonly logger: IStrategyLogger;
  private readonly now: () => number;
  private readonly riskState = new RiskState();
  private readonly risk: RiskManager;
  private runtime: Runtime | null = null;
  private stopping: Promise<void> | null = null;

  constructor(config: EdgeTraderConfig, deps: Partial<EdgeTraderDependencies> = {}) {
    super();
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => Date.now());

    this.risk = new RiskManager(this.riskState, {
      stopLossUsd: config.stopLossUsd,
      takeProfitUsd: config.takeProfitUsd,
      maxRealizedLossUsd: config.maxRealizedLossUsd,
      fatalStalenessMs: config.fatalStalenessSec * 1000,
      minHoldMs: {
        FIVE_MIN: config.series.FIVE_MIN.minHoldSec * 1000,
        FIFTEEN_MIN: config.series.FIFTEEN_MIN.minHoldSec * 1000,
      },
      notionalCaps: {
        orderUsd: config.positionSizeUsd,
        perSeriesUsd: config.maxSeriesNotionalUsd,
        dailyUsd: config.maxDailyNotionalUsd,
      },
      logger: this.logger,
    });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async start(): Promise<void> {
    if (this.runtime) {
      return;
    }
    const { config } = this;
    const estimatorKind = config.estimator;
    if (!isEstimatorKind(estimatorKind)) {
      throw new TraderError(`Unknown estimator: ${estimatorKind}`, TraderErrorCode.CONFIG_INVALID);
    }

    const sinks = await this.createSinks();
    const telemetry = new TelemetryAudit(sinks, {
      snapshotIntervalMs: config.loopIntervalMs,
      alertThresholds: config.alertThresholds,
      onAlerts: (alerts) => this.risk.applyAlerts(alerts, this.now()),
      now: this.now,
      logger: this.logger,
    });

    const definitions = buildSeriesDefinitions(config);
    const resolver = new MarketResolver(
      this.deps.discovery ?? new GammaMarketsClient({ baseUrl: config.gammaApiUrl }),
      {
        series: definitions,
        refreshIntervalMs: config.marketRefreshSec * 1000,
        now: this.now,
        logger: this.logger,
      }
    );
    const stream = new ContractPriceStream({
      // No update within 3x the market refresh interval marks a quote stale
      staleAfterMs: config.marketRefreshSec * 3000,
      createSubscription: this.deps.createSubscription,
      clientOptions: { url: config.clobWsUrl, debug: config.debug },
      now: this.now,
      logger: this.logger,
    });
    const feed = new ReferencePriceFeed(
      this.deps.spotSource ??
        new BinanceSpotClient({ symbol: config.binanceSymbol, baseUrl: config.binanceRestUrl }),
      {
        pollIntervalMs: config.referencePollMs,
        maxStalenessMs: config.referenceMaxStalenessMs,
        symbol: config.binanceSymbol.toLowerCase(),
        now: this.now,
        logger: this.logger,
      }
    );
    const engine = new PaperExecutionEngine(this.risk, telemetry, {
      notionalUsd: config.positionSizeUsd,
      now: this.now,
      logger: this.logger,
    });
    const metrics = new MetricsCollector();
    const estimator = createEstimator({ kind: estimatorKind, sigmaAnnual: config.sigmaAnnual });
    const edge = new EdgeEngine(config.thresholdBps);

    const pipelines = definitions.map(
      (definition) =>
        new SeriesPipeline({
          definition,
          resolver,
          stream,
          feed,
          estimator,
          edge,
          risk: this.risk,
          engine,
          audit: telemetry,
          metrics,
          now: this.now,
          logger: this.logger,
        })
    );

    const runtime: Runtime = { telemetry, stream, feed, engine, metrics, pipelines, timers: [] };
    this.runtime = runtime;

    feed.start();
    telemetry.start(() => this.collectTelemetry(runtime));
    for (const pipeline of pipelines) {
      const tick = (): void => {
        pipeline.tick().catch((error: unknown) => {
          this.logger.error(LogEvents.ERROR, { series: pipeline.series, error: getErrorMessage(error) });
        });
      };
      runtime.timers.push(setInterval(tick, config.loopIntervalMs));
    }

    this.logger.info(LogEvents.TRADER_STARTED, {
      message: `estimator=${estimator.name} threshold=${edge.getThresholdBps()}bps`,
      positionCount: engine.openPositions().length,
    });
    this.emit('started');
  }

  /**
   * Stop every timer and task, then flush the audit trail
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  isRunning(): boolean {
    return this.runtime !== null;
  }

  // ============================================================================
  // Inspection
  // ============================================================================

  getRiskState(): RiskStateSnapshot {
    return this.risk.snapshot();
  }

  getLedger(): LedgerSnapshot | null {
    return this.runtime ? this.runtime.engine.snapshot(this.currentMarks(this.runtime)) : null;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async shutdown(): Promise<void> {
    const runtime = this.runtime;
    if (!runtime) {
      return;
    }

    for (const timer of runtime.timers) {
      clearInterval(timer);
    }
    await Promise.all(runtime.pipelines.map((pipeline) => pipeline.whenIdle()));

    for (const pipeline of runtime.pipelines) {
      pipeline.closeOpenPosition('shutdown');
    }

    runtime.stream.stop();
    await runtime.feed.stop();

    const inputs = this.collectTelemetry(runtime);
    runtime.telemetry.snapshot(inputs);
    await runtime.telemetry.close();

    this.runtime = null;
    this.logger.info(LogEvents.TRADER_STOPPED, {
      realizedPnl: inputs.ledger.realizedPnl,
      positionCount: inputs.ledger.openPositions,
    });
    this.emit('stopped', inputs.ledger);
  }

  private async createSinks(): Promise<AuditSink[]> {
    if (this.deps.auditSinks) {
      return this.deps.auditSinks;
    }
    const { audit } = this.config;
    const sinks: AuditSink[] = [new JsonlAuditSink(audit.jsonlPath, this.logger)];
    if (audit.sqliteEnabled) {
      const repository = new AuditRepository({ dbPath: audit.sqlitePath }, this.logger);
      await repository.initialize();
      sinks.push(repository);
    }
    return sinks;
  }

  private currentMarks(runtime: Runtime): SeriesMarks {
    const marks: SeriesMarks = {};
    for (const series of SERIES_IDS) {
      const price = runtime.stream.lastObservedPrice(series);
      if (price !== null) {
        marks[series] = price;
      }
    }
    return marks;
  }

  private collectTelemetry(runtime: Runtime): TelemetryInputs {
    return {
      ledger: runtime.engine.snapshot(this.currentMarks(runtime)),
      risk: this.risk.snapshot(),
      metrics: runtime.metrics.snapshot(),
    };
  }
}
