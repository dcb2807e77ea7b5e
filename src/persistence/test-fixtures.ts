/**
 * Shared Test Fixtures
 *
 * Factory functions for contracts, positions and series definitions, plus an
 * in-memory audit sink. Used by unit and integration tests.
 */

import type { AuditRecord, AuditRecordKind, AuditSink } from '../types/audit.types.js';
import type { Contract, Position, SeriesDefinition } from '../types/market.types.js';

/** Window start of the default test contract (2026-02-20T01:10:00Z) */
export const TEST_WINDOW_START = 1_771_549_800_000;

const FIVE_MIN_MS = 5 * 60 * 1000;

/**
 * Create a test Contract with sensible defaults (a live 5m window)
 */
export function createContract(overrides: Partial<Contract> = {}): Contract {
  return {
    series: 'FIVE_MIN',
    slug: 'btc-updown-5m-1771549800',
    conditionId: '0xtest-condition',
    question: 'Will BTC be above $66,900 at 01:15 UTC?',
    strike: 66900,
    windowStart: TEST_WINDOW_START,
    expiry: TEST_WINDOW_START + FIVE_MIN_MS,
    yesTokenId: 'tok-yes',
    noTokenId: 'tok-no',
    ...overrides,
  };
}

/**
 * Create a test Position with sensible defaults (25 USD of YES at 0.50)
 */
export function createPosition(overrides: Partial<Position> = {}): Position {
  return {
    series: 'FIVE_MIN',
    slug: 'btc-updown-5m-1771549800',
    side: 'BUY_YES',
    entryPrice: 0.5,
    entryTimestamp: TEST_WINDOW_START + 10_000,
    expiry: TEST_WINDOW_START + 300_000,
    size: 50,
    ...overrides,
  };
}

/**
 * Create a test SeriesDefinition with sensible defaults
 */
export function createSeriesDefinition(overrides: Partial<SeriesDefinition> = {}): SeriesDefinition {
  return {
    id: 'FIVE_MIN',
    label: '5m',
    slugPrefix: 'btc-updown-5m',
    windowMs: FIVE_MIN_MS,
    minHoldMs: 45_000,
    seedSlug: 'btc-updown-5m-1771549800',
    ...overrides,
  };
}

/**
 * Audit sink that keeps records in memory
 */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];
  closed = false;

  append(record: AuditRecord): void {
    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  kinds(): AuditRecordKind[] {
    return this.records.map((record) => record.kind);
  }

  ofKind<K extends AuditRecordKind>(kind: K): Extract<AuditRecord, { kind: K }>[] {
    return this.records.filter((record): record is Extract<AuditRecord, { kind: K }> => record.kind === kind);
  }
}
