/**
 * Market Domain Types
 *
 * Shared types for the edge trading pipeline: series, contracts, quotes,
 * signals and paper positions. Every value here is an immutable snapshot
 * handed between components by value.
 */

// ============================================================================
// Series
// ============================================================================

/**
 * Rolling contract cadences tracked independently
 */
export type SeriesId = 'FIVE_MIN' | 'FIFTEEN_MIN';

export const SERIES_IDS: readonly SeriesId[] = ['FIVE_MIN', 'FIFTEEN_MIN'] as const;

/**
 * Static definition of a series, fixed at startup
 */
export interface SeriesDefinition {
  readonly id: SeriesId;
  /** Short label used in logs and slugs (e.g., '5m') */
  readonly label: string;
  /** Slug prefix of every contract in the series (e.g., 'btc-updown-5m') */
  readonly slugPrefix: string;
  /** Window length in milliseconds */
  readonly windowMs: number;
  /** Minimum time a position must be held before it can be flipped */
  readonly minHoldMs: number;
  /** Fallback slug used when discovery returns no live window */
  readonly seedSlug: string;
}

// ============================================================================
// Contracts
// ============================================================================

/**
 * A single rolling contract instance.
 * Superseded, never mutated, when the series rolls over.
 */
export interface Contract {
  readonly series: SeriesId;
  readonly slug: string;
  readonly conditionId: string;
  readonly question: string;
  /** Reference-price threshold of the binary outcome */
  readonly strike: number;
  /** Window start (ms) */
  readonly windowStart: number;
  /** Expiry / window end (ms) */
  readonly expiry: number;
  /** Outcome token id for YES (or Up) */
  readonly yesTokenId: string;
  /** Outcome token id for NO (or Down), when known */
  readonly noTokenId?: string;
}

// ============================================================================
// Quotes
// ============================================================================

/**
 * Spot price as returned by a reference price source
 */
export interface SpotPrice {
  /** Symbol in lowercase (e.g., 'btcusdt') */
  readonly symbol: string;
  readonly price: number;
  /** Fetch time in milliseconds */
  readonly timestamp: number;
}

export type QuoteSource = 'reference' | 'contract';

export interface Quote {
  readonly source: QuoteSource;
  readonly value: number;
  /** Timestamp in milliseconds when the value was observed */
  readonly observedAt: number;
}

/**
 * Reference feed view: a usable quote (possibly aging) or unavailable
 */
export type ReferenceReading =
  | { readonly kind: 'quote'; readonly quote: Quote; readonly stalenessMs: number }
  | { readonly kind: 'unavailable'; readonly stalenessMs: number | null; readonly since: number };

/**
 * Contract stream view. Only `quote` is tradeable.
 */
export type ContractReading =
  | { readonly kind: 'quote'; readonly quote: Quote }
  | { readonly kind: 'stale'; readonly lastQuote: Quote; readonly ageMs: number }
  | { readonly kind: 'disconnected'; readonly since: number };

// ============================================================================
// Model & Signals
// ============================================================================

export interface ModelEstimate {
  /** Probability of finishing above strike [0, 1] */
  readonly probability: number;
  readonly spot: number;
  readonly strike: number;
  readonly secondsToExpiry: number;
  /** Name of the estimator that produced the value */
  readonly estimator: string;
}

export type SignalDirection = 'BUY_YES' | 'BUY_NO' | 'FLAT';

export interface Signal {
  readonly series: SeriesId;
  readonly direction: SignalDirection;
  /** Signed edge in basis points */
  readonly edgeBps: number;
  readonly timestamp: number;
}

// ============================================================================
// Positions
// ============================================================================

export type PositionSide = Exclude<SignalDirection, 'FLAT'>;

export interface Position {
  readonly series: SeriesId;
  /** Contract the position was opened on; never migrates across rollover */
  readonly slug: string;
  readonly side: PositionSide;
  /** Price paid for the held outcome token (YES price, or 1 - YES for NO) */
  readonly entryPrice: number;
  readonly entryTimestamp: number;
  /** Expiry of the pinned contract (ms) */
  readonly expiry: number;
  /** Outcome token quantity */
  readonly size: number;
}

/** The part of a contract a position pins */
export type ContractRef = Pick<Contract, 'slug' | 'expiry'>;

/**
 * Price of the outcome token a side holds, given the YES price
 */
export function tokenPrice(side: PositionSide, yesPrice: number): number {
  return side === 'BUY_YES' ? yesPrice : 1 - yesPrice;
}

/**
 * Unrealized PnL in USD of a position marked at the given YES price
 */
export function unrealizedPnl(position: Position, markYesPrice: number): number {
  return (tokenPrice(position.side, markYesPrice) - position.entryPrice) * position.size;
}
