/**
 * CLOB Market WebSocket Client
 *
 * Subscribes to Polymarket's CLOB market channel for a single outcome token
 * and emits its latest price. One client per contract: a rollover disposes
 * the client and creates a new one for the successor token.
 *
 * Subscription state machine:
 *
 *   DISCONNECTED -> CONNECTING -> SUBSCRIBED <-> STALE
 *        ^              |             |           |
 *        +--------------+-------------+-----------+   (error / close / timeout)
 *
 * - SUBSCRIBED -> STALE when no price update arrives within `staleTimeout`
 * - STALE -> SUBSCRIBED on the next price update
 * - any failure -> DISCONNECTED, then a reconnect after an exponential
 *   backoff capped at `maxReconnectDelay`, with no attempt limit
 * - disconnect() cancels timers and the socket; nothing reconnects after it
 *
 * Message formats handled:
 * - book:             { event_type, asset_id, bids: [{price,size}], asks: [...] }
 * - price_change:     { event_type, price_changes: [{ asset_id, price, best_bid, best_ask }] }
 *                     (older form: { event_type, asset_id, changes: [{ price }] })
 * - last_trade_price: { event_type, asset_id, price }
 * - keepalive:        text 'PING' out, 'PONG' back
 *
 * @see https://docs.polymarket.com/developers/CLOB/websocket/market-channel
 */

import { EventEmitter } from 'events';
import WebSocket from 'isomorphic-ws';
import { isRecord, toFiniteNumber } from '../utils/json-guards.js';

// ============================================================================
// Types
// ============================================================================

export interface ClobMarketWsConfig {
  /** Outcome token to subscribe to */
  tokenId: string;
  /** Market channel URL (default: wss://ws-subscriptions-clob.polymarket.com/ws/market) */
  url?: string;
  /** First reconnect delay in ms (default: 500) */
  baseReconnectDelay?: number;
  /** Reconnect delay cap in ms (default: 30000) */
  maxReconnectDelay?: number;
  /** Backoff multiplier per attempt (default: 2) */
  backoffFactor?: number;
  /** Relative jitter applied to each delay, 0-1 (default: 0.2) */
  jitter?: number;
  /** Keepalive interval in ms (default: 10000) */
  pingInterval?: number;
  /** Time without a price update before the subscription is STALE (default: 15000) */
  staleTimeout?: number;
  /** Time allowed for the socket to open (default: 10000) */
  connectTimeout?: number;
  /** Enable debug logging (default: false) */
  debug?: boolean;
  /** Clock (default: Date.now) */
  now?: () => number;
  /** Random source for jitter (default: Math.random) */
  random?: () => number;
}

export enum SubscriptionState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  SUBSCRIBED = 'SUBSCRIBED',
  STALE = 'STALE',
}

export interface OutcomePriceUpdate {
  tokenId: string;
  /** Outcome token price (0-1) */
  price: number;
  /** Receive time in ms */
  timestamp: number;
}

export interface ReconnectScheduledEvent {
  attempt: number;
  delayMs: number;
}

// ============================================================================
// Price extraction
// ============================================================================

function midpoint(bid: number | undefined, ask: number | undefined): number | undefined {
  if (bid !== undefined && ask !== undefined && bid > 0 && ask > 0) {
    return (bid + ask) / 2;
  }
  return undefined;
}

function bestLevel(levels: unknown, pick: (a: number, b: number) => number): number | undefined {
  if (!Array.isArray(levels)) return undefined;
  let best: number | undefined;
  for (const level of levels) {
    const price = isRecord(level) ? toFiniteNumber(level.price) : undefined;
    if (price !== undefined) {
      best = best === undefined ? price : pick(best, price);
    }
  }
  return best;
}

/**
 * Extract every price for `tokenId` from a parsed market-channel payload,
 * in message order
 */
export function extractOutcomePrices(payload: unknown, tokenId: string): number[] {
  const prices: number[] = [];

  const visit = (message: unknown, inheritedAssetId?: string): void => {
    if (Array.isArray(message)) {
      for (const item of message) visit(item, inheritedAssetId);
      return;
    }
    if (!isRecord(message)) return;

    const assetId =
      typeof message.asset_id === 'string' ? message.asset_id : inheritedAssetId;
    const eventType = message.event_type;

    if (eventType === 'book') {
      if (assetId === tokenId) {
        const bid = bestLevel(message.bids, Math.max);
        const ask = bestLevel(message.asks, Math.min);
        const price = midpoint(bid, ask) ?? bid ?? ask;
        if (price !== undefined) prices.push(price);
      }
      return;
    }

    if (eventType === 'last_trade_price') {
      const price = toFiniteNumber(message.price);
      if (assetId === tokenId && price !== undefined) prices.push(price);
      return;
    }

    if (eventType === 'price_change' || message.price_changes !== undefined || message.changes !== undefined) {
      const changes = Array.isArray(message.price_changes) ? message.price_changes : message.changes;
      if (Array.isArray(changes)) {
        for (const change of changes) {
          if (!isRecord(change)) continue;
          const changeAsset = typeof change.asset_id === 'string' ? change.asset_id : assetId;
          if (changeAsset !== tokenId) continue;
          const price =
            midpoint(toFiniteNumber(change.best_bid), toFiniteNumber(change.best_ask)) ??
            toFiniteNumber(change.price);
          if (price !== undefined) prices.push(price);
        }
      }
    }
  };

  visit(payload);
  return prices.filter((price) => price >= 0 && price <= 1);
}

// ============================================================================
// ClobMarketWsClient Implementation
// ============================================================================

/**
 * Events:
 * - 'price': OutcomePriceUpdate for each accepted update
 * - 'subscribed': subscription message sent on an open socket
 * - 'stale': no price update within staleTimeout
 * - 'disconnected': socket lost (a reconnect follows unless disconnect() was called)
 * - 'reconnectScheduled': ReconnectScheduledEvent
 * - 'error': transport or parse error
 */
export class ClobMarketWsClient extends EventEmitter {
  private ws: WebSocket | null = null;
  private readonly config: Required<Omit<ClobMarketWsConfig, 'now' | 'random'>>;
  private readonly now: () => number;
  private readonly random: () => number;
  private state: SubscriptionState = SubscriptionState.DISCONNECTED;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private connectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private lastPriceAt = 0;
  private lastMessageAt = 0;
  private disconnectedAt: number;
  private stopped = true;

  private readonly boundHandleOpen: () => void;
  private readonly boundHandleMessage: (data: WebSocket.Data) => void;
  private readonly boundHandleError: (error: Error) => void;
  private readonly boundHandleClose: (code: number, reason: Buffer | string) => void;

  constructor(config: ClobMarketWsConfig) {
    super();
    if (!config.tokenId) {
      throw new Error('tokenId is required');
    }
    this.config = {
      tokenId: config.tokenId,
      url: config.url ?? 'wss://ws-subscriptions-clob.polymarket.com/ws/market',
      baseReconnectDelay: config.baseReconnectDelay ?? 500,
      maxReconnectDelay: config.maxReconnectDelay ?? 30000,
      backoffFactor: config.backoffFactor ?? 2,
      jitter: config.jitter ?? 0.2,
      pingInterval: config.pingInterval ?? 10000,
      staleTimeout: config.staleTimeout ?? 15000,
      connectTimeout: config.connectTimeout ?? 10000,
      debug: config.debug ?? false,
    };
    this.now = config.now ?? (() => Date.now());
    this.random = config.random ?? (() => Math.random());
    this.disconnectedAt = this.now();

    this.boundHandleOpen = this.handleOpen.bind(this);
    this.boundHandleMessage = this.handleMessage.bind(this);
    this.boundHandleError = this.handleError.bind(this);
    this.boundHandleClose = this.handleClose.bind(this);
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Start the subscription; reconnects until disconnect() is called
   */
  connect(): this {
    this.stopped = false;
    if (this.state !== SubscriptionState.DISCONNECTED || this.reconnectTimer) {
      this.log('Already connected or connecting');
      return this;
    }
    this.openSocket();
    return this;
  }

  /**
   * Cancel the subscription. No reconnect is attempted afterwards.
   */
  disconnect(): void {
    this.log('Disconnecting...');
    this.stopped = true;
    const wasConnected = this.state !== SubscriptionState.DISCONNECTED;
    this.clearTimers();
    this.teardownSocket();
    this.setDisconnected();
    this.reconnectAttempts = 0;

    if (wasConnected) {
      this.emit('disconnected');
    }
  }

  getState(): SubscriptionState {
    return this.state;
  }

  getTokenId(): string {
    return this.config.tokenId;
  }

  getReconnectAttempts(): number {
    return this.reconnectAttempts;
  }

  /** When the client last lost a live subscription (ms); construction time until then */
  getDisconnectedAt(): number {
    return this.disconnectedAt;
  }

  /**
   * Backoff delay before reconnect attempt `attempt` (1-based), without jitter
   */
  backoffDelay(attempt: number): number {
    const { baseReconnectDelay, backoffFactor, maxReconnectDelay } = this.config;
    return Math.min(maxReconnectDelay, baseReconnectDelay * backoffFactor ** Math.max(0, attempt - 1));
  }

  // ============================================================================
  // Private Methods - Connection Management
  // ============================================================================

  private openSocket(): void {
    this.state = SubscriptionState.CONNECTING;
    this.log(`Connecting to ${this.config.url}...`);

    try {
      this.ws = new WebSocket(this.config.url);
      this.ws.on('open', this.boundHandleOpen);
      this.ws.on('message', this.boundHandleMessage);
      this.ws.on('error', this.boundHandleError);
      this.ws.on('close', this.boundHandleClose);
    } catch (error) {
      this.handleError(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      if (this.state === SubscriptionState.CONNECTING) {
        this.log('Connection timed out');
        this.failConnection(new Error('Connection timeout'));
      }
    }, this.config.connectTimeout);
  }

  private handleOpen(): void {
    this.clearConnectTimer();
    const now = this.now();
    this.reconnectAttempts = 0;
    this.lastPriceAt = now;
    this.lastMessageAt = now;

    this.ws?.send(JSON.stringify({ type: 'market', assets_ids: [this.config.tokenId] }));
    this.state = SubscriptionState.SUBSCRIBED;
    this.log(`Subscribed to ${this.config.tokenId}`);
    this.startHeartbeat();
    this.emit('subscribed');
  }

  private handleMessage(data: WebSocket.Data): void {
    const now = this.now();
    this.lastMessageAt = now;
    const text = data.toString();

    if (text === 'PONG') {
      return;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      this.log(`Failed to parse message`);
      this.emit('error', new Error('Message parsing error'));
      return;
    }

    const prices = extractOutcomePrices(payload, this.config.tokenId);
    if (prices.length === 0) {
      return;
    }

    this.lastPriceAt = now;
    if (this.state === SubscriptionState.STALE) {
      this.state = SubscriptionState.SUBSCRIBED;
      this.log('Subscription fresh again');
    }

    const update: OutcomePriceUpdate = {
      tokenId: this.config.tokenId,
      price: prices[prices.length - 1],
      timestamp: now,
    };
    this.emit('price', update);
  }

  private handleError(error: Error): void {
    this.log(`WebSocket error: ${error.message}`);
    this.emit('error', error);
    this.failConnection(error);
  }

  private handleClose(code: number, reason: Buffer | string): void {
    this.log(`Connection closed: code=${code}, reason=${reason.toString() || 'none'}`);
    this.failConnection(new Error(`Connection closed (${code})`));
  }

  /**
   * Drop the current socket and schedule the next attempt
   */
  private failConnection(_cause: Error): void {
    const wasLive = this.state !== SubscriptionState.DISCONNECTED;
    this.clearTimers();
    this.teardownSocket();
    this.setDisconnected();

    if (wasLive) {
      this.emit('disconnected');
    }
    if (!this.stopped) {
      this.scheduleReconnect();
    }
  }

  private teardownSocket(): void {
    if (!this.ws) return;
    const ws = this.ws;
    this.ws = null;
    ws.removeAllListeners();
    // Closing a socket that never opened emits one last error
    ws.on('error', () => {});
    ws.close();
  }

  /**
   * An outage starts when a live subscription is lost; failed attempts
   * while reconnecting leave its start where it was
   */
  private setDisconnected(): void {
    if (this.state === SubscriptionState.SUBSCRIBED || this.state === SubscriptionState.STALE) {
      this.disconnectedAt = this.now();
    }
    this.state = SubscriptionState.DISCONNECTED;
  }

  // ============================================================================
  // Private Methods - Heartbeat & Reconnection
  // ============================================================================

  private startHeartbeat(): void {
    this.clearHeartbeat();
    const interval = Math.min(this.config.pingInterval, this.config.staleTimeout);

    this.heartbeatTimer = setInterval(() => {
      const now = this.now();

      if (now - this.lastMessageAt > this.config.pingInterval * 3) {
        this.log('No traffic on socket, reconnecting...');
        this.failConnection(new Error('Socket silent'));
        return;
      }

      if (this.state === SubscriptionState.SUBSCRIBED && now - this.lastPriceAt > this.config.staleTimeout) {
        this.state = SubscriptionState.STALE;
        this.log(`No price update for ${now - this.lastPriceAt}ms`);
        this.emit('stale');
      }

      if (this.ws?.readyState === WebSocket.OPEN) {
        this.ws.send('PING');
      }
    }, interval);
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) {
      return;
    }

    this.reconnectAttempts++;
    const base = this.backoffDelay(this.reconnectAttempts);
    const spread = this.config.jitter * (2 * this.random() - 1);
    const delayMs = Math.max(0, Math.round(base * (1 + spread)));
    this.log(`Reconnecting in ${delayMs}ms (attempt ${this.reconnectAttempts})`);
    const event: ReconnectScheduledEvent = { attempt: this.reconnectAttempts, delayMs };
    this.emit('reconnectScheduled', event);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped) {
        this.openSocket();
      }
    }, delayMs);
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearConnectTimer();
    this.clearHeartbeat();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[ClobMarketWsClient] ${message}`);
    }
  }
}
