/**
 * Series Pipeline
 *
 * One per series. Each tick: resolve the active contract (handling
 * rollover), read both feeds, estimate, compute edge, ask RiskManager for a
 * decision, record the series_snapshot and apply the decision through the
 * paper engine.
 *
 * Ticks for the same series never overlap; a tick that finds the previous
 * one still running is dropped and counted. A tick never throws.
 */

import type { AuditWriter, SeriesSnapshotRecord, SnapshotDecision } from '../types/audit.types.js';
import {
  tokenPrice,
  type Contract,
  type ContractReading,
  type ModelEstimate,
  type Position,
  type ReferenceReading,
  type SeriesDefinition,
  type SeriesId,
  type Signal,
} from '../types/market.types.js';
import type { Estimator } from '../strategies/probability-model.js';
import type { EdgeEngine } from '../strategies/edge-engine.js';
import type { MarketResolver, ResolveResult } from './market-resolver.js';
import type { ContractPriceStream } from './contract-price-stream.js';
import type { ReferencePriceFeed } from './reference-price-feed.js';
import type { RiskDecision, RiskManager } from './risk-manager.js';
import type { PaperExecutionEngine } from './paper-execution-engine.js';
import type { MetricsCollector } from './metrics-collector.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { getErrorMessage, isTraderError } from '../utils/trader-error.js';

// ============================================================================
// Types
// ============================================================================

export type ContractSource = Pick<MarketResolver, 'resolve' | 'getActive'>;

export type ContractQuotes = Pick<
  ContractPriceStream,
  'subscribe' | 'latest' | 'disconnectedSince' | 'lastObservedPrice' | 'activeSlug'
>;

export type ReferenceQuotes = Pick<ReferencePriceFeed, 'latest' | 'unavailableSince'>;

export interface SeriesPipelineDeps {
  definition: SeriesDefinition;
  resolver: ContractSource;
  stream: ContractQuotes;
  feed: ReferenceQuotes;
  estimator: Estimator;
  edge: EdgeEngine;
  risk: RiskManager;
  engine: PaperExecutionEngine;
  audit: AuditWriter;
  metrics: MetricsCollector;
  /** Clock (default: Date.now) */
  now?: () => number;
  /** Monotonic clock for latency measurement (default: performance.now) */
  monotonic?: () => number;
  logger?: IStrategyLogger;
}

/** Model inputs and output for a tick that reached the edge engine */
interface Evaluation {
  readonly estimate: ModelEstimate;
  readonly markYesPrice: number;
  readonly signal: Signal;
}

export const SkipReasons = {
  REFERENCE_UNAVAILABLE: 'reference_unavailable',
  CONTRACT_STALE: 'contract_stale',
  CONTRACT_DISCONNECTED: 'contract_disconnected',
  CONTRACT_EXPIRED: 'contract_expired',
  RESOLVE_FAILED: 'resolve_failed',
} as const;

// ============================================================================
// Helpers
// ============================================================================

function skipReasonFor(
  contract: Contract,
  reference: ReferenceReading,
  reading: ContractReading,
  now: number
): string | null {
  if (reference.kind === 'unavailable') {
    return SkipReasons.REFERENCE_UNAVAILABLE;
  }
  if (reading.kind === 'stale') {
    return SkipReasons.CONTRACT_STALE;
  }
  if (reading.kind === 'disconnected') {
    return SkipReasons.CONTRACT_DISCONNECTED;
  }
  if (now >= contract.expiry) {
    return SkipReasons.CONTRACT_EXPIRED;
  }
  return null;
}

function snapshotDecision(decision: RiskDecision, skipReason: string | null): SnapshotDecision {
  if ((decision.type === 'no_op' || decision.type === 'hold') && skipReason !== null) {
    return 'skip';
  }
  return decision.type;
}

function snapshotReason(decision: RiskDecision, skipReason: string | null): string | undefined {
  switch (decision.type) {
    case 'reject':
    case 'close':
      return decision.reason;
    case 'no_op':
    case 'hold':
      return skipReason ?? undefined;
    default:
      return undefined;
  }
}

// ============================================================================
// SeriesPipeline Implementation
// ============================================================================

export class SeriesPipeline {
  readonly series: SeriesId;
  private readonly deps: SeriesPipelineDeps;
  private readonly now: () => number;
  private readonly monotonic: () => number;
  private readonly logger: IStrategyLogger;
  private inFlight: Promise<void> | null = null;

  constructor(deps: SeriesPipelineDeps) {
    this.deps = deps;
    this.series = deps.definition.id;
    this.now = deps.now ?? (() => Date.now());
    this.monotonic = deps.monotonic ?? (() => performance.now());
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Run one tick unless the previous one is still in flight
   */
  tick(): Promise<void> {
    if (this.inFlight) {
      this.deps.metrics.recordSkippedTick();
      this.logger.warn(LogEvents.TICK_OVERLAP, { series: this.series });
      return this.inFlight;
    }
    const run = this.runTick().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /**
   * Resolves once no tick is in flight
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Close the series' open position at its last observed price
   */
  closeOpenPosition(reason: 'shutdown'): void {
    const position = this.deps.engine.getPosition(this.series);
    if (!position) {
      return;
    }
    this.submit(() => this.deps.engine.close(this.series, this.exitYesPrice(position, null), reason));
  }

  // ============================================================================
  // Tick
  // ============================================================================

  private async runTick(): Promise<void> {
    try {
      this.deps.metrics.recordLoop();
      const contract = await this.resolveContract();
      this.evaluate(contract);
    } catch (error) {
      this.logger.error(LogEvents.ERROR, {
        series: this.series,
        error: getErrorMessage(error),
        errorCode: isTraderError(error) ? error.code : undefined,
      });
    }
  }

  /**
   * Resolve the active contract and apply a rollover; null when the series
   * has no live contract this tick
   */
  private async resolveContract(): Promise<Contract | null> {
    const { resolver, stream, audit } = this.deps;

    let resolved: ResolveResult;
    try {
      resolved = await resolver.resolve(this.series);
    } catch (error) {
      const reason = isTraderError(error) ? error.code : SkipReasons.RESOLVE_FAILED;
      this.logger.warn(LogEvents.MARKET_RESOLVE_FAILED, {
        series: this.series,
        error: getErrorMessage(error),
        reason,
      });
      this.recordSkip(resolver.getActive(this.series)?.slug ?? null, reason);
      return null;
    }

    const { contract, previous, rolled } = resolved;
    if (rolled) {
      const previousSlug = previous?.slug ?? null;
      audit.append({
        kind: 'market_roll',
        timestamp: new Date(this.now()).toISOString(),
        series: this.series,
        slug: contract.slug,
        previousSlug,
        conditionId: contract.conditionId,
        yesTokenId: contract.yesTokenId,
        strike: contract.strike,
        expiry: new Date(contract.expiry).toISOString(),
      });
      this.logger.info(LogEvents.MARKET_ROLL, {
        series: this.series,
        slug: contract.slug,
        previousSlug: previousSlug ?? undefined,
        strike: contract.strike,
      });

      // Close before re-subscribing: the last observed price belongs to the retiring contract
      this.settleRoll(contract);
    }

    if (stream.activeSlug(this.series) !== contract.slug) {
      stream.subscribe(contract);
    }
    return contract;
  }

  /**
   * Ask RiskManager about a position left on the retiring contract. The
   * stream still carries that contract's prices, so no mark is passed.
   */
  private settleRoll(contract: Contract): void {
    const { engine, feed, risk } = this.deps;
    const position = engine.getPosition(this.series);
    if (!position) {
      return;
    }
    const now = this.now();
    const decision = risk.evaluate({
      series: this.series,
      now,
      contract,
      signal: null,
      position,
      markYesPrice: null,
      feedHealth: { referenceUnavailableSince: feed.unavailableSince(now), contractDisconnectedSince: null },
    });
    if (decision.type === 'close') {
      this.submit(() => engine.close(this.series, this.exitYesPrice(position, null), decision.reason));
    }
  }

  private evaluate(contract: Contract | null): void {
    const { stream, feed, estimator, edge, risk, engine, metrics } = this.deps;
    const now = this.now();
    const position = engine.getPosition(this.series);
    const reference = feed.latest(now);
    const reading = stream.latest(this.series, now);
    const markYesPrice = reading.kind === 'quote' ? reading.quote.value : null;

    let evaluation: Evaluation | null = null;
    if (contract && reference.kind === 'quote' && reading.kind === 'quote' && now < contract.expiry) {
      const spot = reference.quote.value;
      const secondsToExpiry = (contract.expiry - now) / 1000;
      const probability = estimator.estimate(spot, contract.strike, secondsToExpiry);
      const signal = edge.evaluate(this.series, probability, reading.quote.value, now);
      evaluation = {
        estimate: { probability, spot, strike: contract.strike, secondsToExpiry, estimator: estimator.name },
        markYesPrice: reading.quote.value,
        signal,
      };
      if (signal.direction !== 'FLAT') {
        this.logger.info(LogEvents.SIGNAL_GENERATED, {
          series: this.series,
          slug: contract.slug,
          side: signal.direction,
          edgeBps: signal.edgeBps,
          probability,
          price: reading.quote.value,
        });
      }
    }

    const skipReason = contract ? skipReasonFor(contract, reference, reading, now) : null;
    if (skipReason) {
      this.logger.info(LogEvents.TICK_SKIPPED, { series: this.series, slug: contract?.slug, reason: skipReason });
    }

    const decision = risk.evaluate({
      series: this.series,
      now,
      contract,
      signal: evaluation?.signal ?? null,
      position,
      markYesPrice,
      feedHealth: {
        referenceUnavailableSince: feed.unavailableSince(now),
        contractDisconnectedSince: contract ? stream.disconnectedSince(this.series, now) : null,
      },
    });

    if (decision.type === 'reject') {
      metrics.recordReject();
    }
    // Without a contract the skip was already recorded; only forced closes apply
    if (contract) {
      this.recordSnapshot(contract, reference, evaluation, decision, skipReason, now);
    }

    this.apply(decision, contract, position, evaluation, markYesPrice);
  }

  private apply(
    decision: RiskDecision,
    contract: Contract | null,
    position: Position | null,
    evaluation: Evaluation | null,
    markYesPrice: number | null
  ): void {
    const { engine } = this.deps;

    switch (decision.type) {
      case 'no_op':
      case 'hold':
      case 'reject':
        return;
      case 'close':
        if (position) {
          const exit = this.exitYesPrice(position, markYesPrice);
          this.submit(() => engine.close(this.series, exit, decision.reason));
        }
        return;
      case 'open':
      case 'flip': {
        if (!contract || !evaluation) {
          throw new Error(`Series ${this.series} ${decision.type} decided without a quote`);
        }
        const { side } = decision;
        const price = evaluation.markYesPrice;
        if (decision.type === 'open') {
          this.submit(() => engine.open(this.series, contract, side, price));
        } else {
          this.submit(() => engine.flip(this.series, contract, side, price));
        }
        return;
      }
    }
  }

  /**
   * Apply a paper action and record its decision-to-submit latency
   */
  private submit(action: () => unknown): void {
    const startedAt = this.monotonic();
    action();
    this.deps.metrics.recordSubmit(this.monotonic() - startedAt);
  }

  /**
   * Best YES-equivalent exit price: the tradeable mark, else the last price
   * seen on the stream, else the entry price
   */
  private exitYesPrice(position: Position, markYesPrice: number | null): number {
    return (
      markYesPrice ??
      this.deps.stream.lastObservedPrice(this.series) ??
      tokenPrice(position.side, position.entryPrice)
    );
  }

  // ============================================================================
  // Audit
  // ============================================================================

  private recordSnapshot(
    contract: Contract,
    reference: ReferenceReading,
    evaluation: Evaluation | null,
    decision: RiskDecision,
    skipReason: string | null,
    now: number
  ): void {
    const reason = snapshotReason(decision, skipReason);
    const record: SeriesSnapshotRecord = {
      kind: 'series_snapshot',
      timestamp: new Date(now).toISOString(),
      series: this.series,
      slug: contract.slug,
      estimator: this.deps.estimator.name,
      spot: evaluation?.estimate.spot ?? (reference.kind === 'quote' ? reference.quote.value : null),
      strike: contract.strike,
      marketYesPrice: evaluation?.markYesPrice ?? null,
      modelProbability: evaluation?.estimate.probability ?? null,
      edgeBps: evaluation?.signal.edgeBps ?? null,
      secondsToExpiry: Math.max(0, (contract.expiry - now) / 1000),
      signal: evaluation?.signal.direction ?? null,
      decision: snapshotDecision(decision, skipReason),
      ...(reason !== undefined ? { reason } : {}),
    };
    this.deps.audit.append(record);
  }

  private recordSkip(slug: string | null, reason: string): void {
    this.deps.audit.append({
      kind: 'series_snapshot',
      timestamp: new Date(this.now()).toISOString(),
      series: this.series,
      slug,
      estimator: this.deps.estimator.name,
      spot: null,
      strike: null,
      marketYesPrice: null,
      modelProbability: null,
      edgeBps: null,
      secondsToExpiry: null,
      signal: null,
      decision: 'skip',
      reason,
    });
  }
}
