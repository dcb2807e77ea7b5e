/**
 * Strategy Logger
 *
 * Structured JSON logging for the edge trader. Emits one JSON object per
 * line on stdout so log aggregators can filter by series, event and level.
 *
 * Key features:
 * - Consistent context fields: timestamp, level, strategy, event
 * - Closed event catalogue (LogEvents) for filtering
 * - No credentials or raw upstream payloads in log lines
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Standard event names for consistent filtering
 */
export const LogEvents = {
  // Lifecycle
  TRADER_STARTED: 'trader_started',
  TRADER_STOPPED: 'trader_stopped',
  CONFIG_LOADED: 'config_loaded',
  CONFIG_INVALID: 'config_invalid',

  // Market lifecycle
  MARKET_ROLL: 'market_roll',
  MARKET_RESOLVE_FAILED: 'market_resolve_failed',
  MARKET_SEED_FALLBACK: 'market_seed_fallback',
  METADATA_INCOMPLETE: 'metadata_incomplete',

  // Feeds
  REFERENCE_FETCH_FAILED: 'reference_fetch_failed',
  REFERENCE_UNAVAILABLE: 'reference_unavailable',
  STREAM_CONNECTED: 'stream_connected',
  STREAM_DISCONNECTED: 'stream_disconnected',
  STREAM_RECONNECT_SCHEDULED: 'stream_reconnect_scheduled',
  STREAM_STALE: 'stream_stale',
  STREAM_ERROR: 'stream_error',

  // Decisions
  TICK_SKIPPED: 'tick_skipped',
  TICK_OVERLAP: 'tick_overlap',
  SIGNAL_GENERATED: 'signal_generated',
  SIGNAL_REJECTED: 'signal_rejected',
  RISK_LIMIT_TRIGGERED: 'risk_limit_triggered',
  KILL_SWITCH_ACTIVATED: 'kill_switch_activated',

  // Paper Trading
  PAPER_OPEN: 'paper_open',
  PAPER_CLOSE: 'paper_close',

  // Audit
  AUDIT_SINK_ERROR: 'audit_sink_error',
  TELEMETRY_ALERT: 'telemetry_alert',
  REPOSITORY_INITIALIZED: 'repository_initialized',

  // General
  ERROR: 'error',
} as const;

export type LogEventType = (typeof LogEvents)[keyof typeof LogEvents];

/**
 * Base log entry with required fields
 */
export interface BaseLogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Strategy name (e.g., 'StrikeEdge') */
  strategy: string;
  /** Event type for filtering (e.g., 'signal_generated') */
  event: LogEventType;
  /** Service name */
  _service: string;
  /** Application name */
  _app: string;
  /** Deployment environment */
  _env: string;
}

/**
 * Context fields for log entries (excludes base fields)
 */
export interface LogContext {
  /** Series id (FIVE_MIN, FIFTEEN_MIN) */
  series?: string;
  /** Contract slug (e.g., 'btc-updown-5m-1771549800') */
  slug?: string;
  /** Previous contract slug on rollover */
  previousSlug?: string;
  /** Outcome token id */
  tokenId?: string;
  /** Reference symbol (e.g., 'BTCUSDT') */
  symbol?: string;
  /** Signal direction or position side */
  side?: 'BUY_YES' | 'BUY_NO' | 'FLAT';
  /** Signed edge in basis points */
  edgeBps?: number;
  /** Model probability (0-1) */
  probability?: number;
  /** Fill or quote price */
  price?: number;
  /** Strike price */
  strike?: number;
  /** Position size */
  size?: number;
  /** Realized P&L of a fill */
  pnl?: number;
  /** Cumulative realized P&L */
  realizedPnl?: number;
  /** Stream connection state */
  state?: string;
  /** Reconnect attempt number */
  attempt?: number;
  /** Delay before the next attempt (ms) */
  delayMs?: number;
  /** Age of the latest observation (ms) */
  stalenessMs?: number;
  /** Skip / reject / trigger reason */
  reason?: string;
  /** Error message */
  error?: string;
  /** Error code (for categorization) */
  errorCode?: string;
  /** Human-readable message */
  message?: string;
  /** Number of open positions */
  positionCount?: number;
  /** Audit or database path */
  path?: string;
  /** Configuration issues */
  issues?: string[];
}

/**
 * Full log entry combining base fields and context
 */
export interface LogEntry extends BaseLogEntry, LogContext {}

/**
 * Configuration for StrategyLogger
 */
export interface StrategyLoggerConfig {
  /** Strategy name to include in all logs */
  strategy: string;
  /** Whether to enable logging (default: true) */
  enabled?: boolean;
  /** Service name (default: 'strike-edge') */
  service?: string;
  /** Application name (default: 'paper-trader') */
  app?: string;
  /** Environment (e.g., 'production', 'staging', 'development') */
  environment?: string;
}

// ============================================================================
// IStrategyLogger Interface
// ============================================================================

/**
 * Interface for strategy loggers
 *
 * Enables dependency injection and testability.
 */
export interface IStrategyLogger {
  /** Log an INFO level message */
  info(event: LogEventType, context?: LogContext): void;
  /** Log a WARN level message */
  warn(event: LogEventType, context?: LogContext): void;
  /** Log an ERROR level message */
  error(event: LogEventType, context?: LogContext): void;
  /** Check if logging is enabled */
  isEnabled(): boolean;
}

// ============================================================================
// StrategyLogger Implementation
// ============================================================================

/** Maximum error message length to prevent log bloat */
const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * Structured JSON logger
 *
 * @example
 * const logger = new StrategyLogger({ strategy: 'StrikeEdge' });
 *
 * logger.info(LogEvents.SIGNAL_GENERATED, {
 *   series: 'FIVE_MIN',
 *   side: 'BUY_YES',
 *   edgeBps: 1200,
 * });
 *
 * // Outputs:
 * // {"series":"FIVE_MIN","side":"BUY_YES","edgeBps":1200,"timestamp":"...","level":"INFO",...}
 */
export class StrategyLogger implements IStrategyLogger {
  private readonly config: {
    readonly strategy: string;
    readonly service: string;
    readonly app: string;
    readonly environment: string;
  };
  private readonly enabled: boolean;

  constructor(config: StrategyLoggerConfig) {
    this.enabled = config.enabled ?? true;
    this.config = {
      strategy: config.strategy,
      service: config.service ?? 'strike-edge',
      app: config.app ?? 'paper-trader',
      environment: config.environment ?? process.env.NODE_ENV ?? 'development',
    };
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Log an INFO level message
   *
   * Use for normal operational events: rollovers, signals, paper fills.
   */
  info(event: LogEventType, context?: LogContext): void {
    this.log('INFO', event, context);
  }

  /**
   * Log a WARN level message
   *
   * Use for degraded-but-recovering conditions: skipped ticks, rejected
   * signals, transient fetch failures, stale streams.
   */
  warn(event: LogEventType, context?: LogContext): void {
    this.log('WARN', event, context);
  }

  /**
   * Log an ERROR level message
   *
   * Use for kill switch activation, sink failures and unexpected exceptions.
   */
  error(event: LogEventType, context?: LogContext): void {
    this.log('ERROR', event, context);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Sanitize error message to prevent log bloat
   */
  static sanitizeErrorMessage(error: unknown): string {
    const msg = error instanceof Error ? error.message : String(error);
    if (msg.length > MAX_ERROR_MESSAGE_LENGTH) {
      return msg.substring(0, MAX_ERROR_MESSAGE_LENGTH) + '...';
    }
    return msg;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Base fields are applied after context so context cannot override them.
   */
  private log(level: LogLevel, event: LogEventType, context?: LogContext): void {
    if (!this.enabled) {
      return;
    }

    const entry: LogEntry = {
      ...context,
      timestamp: new Date().toISOString(),
      level,
      strategy: this.config.strategy,
      event,
      _service: this.config.service,
      _app: this.config.app,
      _env: this.config.environment,
    };

    console.log(JSON.stringify(entry));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a logger for the edge trader
 */
export function createEdgeTraderLogger(
  options?: Partial<Omit<StrategyLoggerConfig, 'strategy'>>
): IStrategyLogger {
  return new StrategyLogger({
    strategy: 'StrikeEdge',
    ...options,
  });
}

/**
 * Logger that drops everything; used where logging is optional
 */
export const silentLogger: IStrategyLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  isEnabled: () => false,
};
