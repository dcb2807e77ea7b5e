/**
 * AuditRepository - SQLite mirror of the audit trail
 *
 * Append-only table written through better-sqlite3. In async mode appends
 * are queued and drained on setImmediate; close() flushes the queue.
 */

import Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync, realpathSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

import {
  AUDIT_RECORD_KINDS,
  type AuditRecord,
  type AuditRecordKind,
  type AuditSeriesTag,
  type AuditSink,
} from '../types/audit.types.js';
import { SERIES_IDS } from '../types/market.types.js';
import { isRecord, readNumber, readString } from '../utils/json-guards.js';
import { LogEvents, silentLogger, type IStrategyLogger } from '../utils/strategy-logger.js';
import { getErrorMessage } from '../utils/trader-error.js';

// ============================================================================
// Constants
// ============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/** Default allowed base directory for database files */
const DEFAULT_ALLOWED_BASE_DIR = './data';

/** Maximum number of pending writes in the async queue */
const MAX_WRITE_QUEUE_SIZE = 1000;

/** SQLite busy timeout in milliseconds */
const BUSY_TIMEOUT_MS = 5000;

const INVALID_PATH_MESSAGE = 'Invalid database path specified';

// ============================================================================
// Types
// ============================================================================

export interface AuditRepositoryConfig {
  dbPath: string;
  /** 'sync' writes inline; 'async' queues writes (default: 'async') */
  syncMode: 'sync' | 'async';
}

/** A stored audit row; payload is the record as written */
export interface StoredAuditRecord {
  id: number;
  kind: AuditRecordKind;
  series: AuditSeriesTag;
  timestamp: string;
  slug: string | null;
  payload: Record<string, unknown>;
}

function isAuditRecordKind(value: string): value is AuditRecordKind {
  return AUDIT_RECORD_KINDS.some((kind) => kind === value);
}

function isAuditSeriesTag(value: string): value is AuditSeriesTag {
  return value === 'ALL' || SERIES_IDS.some((series) => series === value);
}

function parseAuditRow(row: unknown): StoredAuditRecord {
  if (!isRecord(row)) {
    throw new Error('Malformed audit row');
  }
  const id = readNumber(row, 'id');
  const kind = readString(row, 'kind');
  const series = readString(row, 'series');
  const timestamp = readString(row, 'timestamp');
  const payloadText = readString(row, 'payload');
  if (id === undefined || !kind || !series || !timestamp || !payloadText) {
    throw new Error('Malformed audit row');
  }
  if (!isAuditRecordKind(kind)) {
    throw new Error(`Invalid audit kind: ${kind}. Expected one of: ${AUDIT_RECORD_KINDS.join(', ')}`);
  }
  if (!isAuditSeriesTag(series)) {
    throw new Error(`Invalid audit series: ${series}`);
  }
  const payload: unknown = JSON.parse(payloadText);
  if (!isRecord(payload)) {
    throw new Error(`Audit row ${id} payload is not an object`);
  }
  return { id, kind, series, timestamp, slug: readString(row, 'slug') ?? null, payload };
}

// ============================================================================
// AuditRepository Implementation
// ============================================================================

export class AuditRepository implements AuditSink {
  private db: Database.Database | null = null;
  private readonly config: AuditRepositoryConfig;
  private readonly logger: IStrategyLogger;
  private writeQueue: Array<() => void> = [];
  private isProcessingQueue = false;

  private statements: {
    insertRecord?: Statement;
    selectAll?: Statement;
    selectByKind?: Statement;
    countByKind?: Statement;
  } = {};

  constructor(config: Partial<AuditRepositoryConfig> = {}, logger: IStrategyLogger = silentLogger) {
    this.config = {
      dbPath: config.dbPath ?? './data/edge-trader/audit.db',
      syncMode: config.syncMode ?? 'async',
    };
    this.logger = logger;
  }

  // ============================================================================
  // Database Access (Safe Getter)
  // ============================================================================

  private get database(): Database.Database {
    if (!this.db) {
      throw new Error('AuditRepository not initialized. Call initialize() first.');
    }
    return this.db;
  }

  // ============================================================================
  // Lifecycle Methods
  // ============================================================================

  /**
   * Open the database and run migrations
   */
  async initialize(): Promise<void> {
    if (this.db) {
      return;
    }
    this.validateDbPath(this.config.dbPath);
    mkdirSync(dirname(this.config.dbPath), { recursive: true });

    this.db = new Database(this.config.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

    this.runMigrations();
    this.initializeStatements();
    this.logger.info(LogEvents.REPOSITORY_INITIALIZED, { path: this.config.dbPath });
  }

  /**
   * Flush queued writes and close the connection
   */
  async close(): Promise<void> {
    await this.flushWriteQueue();
    this.statements = {};
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Database files must live under ./data or ./test-data, symlinks included
   */
  private validateDbPath(dbPath: string): void {
    const resolvedPath = resolve(dbPath);
    const allowedBase = resolve(DEFAULT_ALLOWED_BASE_DIR);
    const testBase = resolve('./test-data');

    if (!resolvedPath.startsWith(allowedBase) && !resolvedPath.startsWith(testBase)) {
      throw new Error(INVALID_PATH_MESSAGE);
    }

    const dbDir = dirname(resolvedPath);
    if (existsSync(dbDir)) {
      const realDir = realpathSync(dbDir);
      const realAllowedBase = existsSync(allowedBase) ? realpathSync(allowedBase) : allowedBase;
      const realTestBase = existsSync(testBase) ? realpathSync(testBase) : testBase;
      if (!realDir.startsWith(realAllowedBase) && !realDir.startsWith(realTestBase)) {
        throw new Error(INVALID_PATH_MESSAGE);
      }
    }
  }

  private initializeStatements(): void {
    const db = this.database;

    this.statements.insertRecord = db.prepare(`
      INSERT INTO audit_records (kind, series, timestamp, slug, payload)
      VALUES (@kind, @series, @timestamp, @slug, @payload)
    `);

    this.statements.selectAll = db.prepare(`
      SELECT * FROM audit_records ORDER BY id ASC
    `);

    this.statements.selectByKind = db.prepare(`
      SELECT * FROM audit_records WHERE kind = ? ORDER BY id ASC
    `);

    this.statements.countByKind = db.prepare(`
      SELECT kind, COUNT(*) as count FROM audit_records GROUP BY kind
    `);
  }

  private getStatement(name: keyof typeof this.statements): Statement {
    const stmt = this.statements[name];
    if (!stmt) {
      throw new Error(`Statement ${name} not initialized`);
    }
    return stmt;
  }

  // ============================================================================
  // Writes
  // ============================================================================

  /**
   * Append a record. In async mode the insert runs on a later turn and
   * failures are logged.
   */
  append(record: AuditRecord): void {
    const stmt = this.getStatement('insertRecord');
    const params = {
      kind: record.kind,
      series: record.series,
      timestamp: record.timestamp,
      slug: 'slug' in record ? record.slug : null,
      payload: JSON.stringify(record),
    };

    this.executeWrite(() => {
      stmt.run(params);
    }).catch((error: unknown) => {
      this.logger.error(LogEvents.AUDIT_SINK_ERROR, {
        path: this.config.dbPath,
        error: getErrorMessage(error),
        message: record.kind,
      });
    });
  }

  private executeWrite<T>(operation: () => T): Promise<T> {
    if (this.config.syncMode === 'sync') {
      return Promise.resolve(operation());
    }

    if (this.writeQueue.length >= MAX_WRITE_QUEUE_SIZE) {
      return Promise.reject(new Error(`Write queue full (limit: ${MAX_WRITE_QUEUE_SIZE}). Try again later.`));
    }

    return new Promise((resolvePromise, reject) => {
      this.queueWrite(() => {
        try {
          resolvePromise(operation());
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  private queueWrite(operation: () => void): void {
    this.writeQueue.push(operation);
    this.processWriteQueue();
  }

  private processWriteQueue(): void {
    if (this.isProcessingQueue || this.writeQueue.length === 0) {
      return;
    }

    this.isProcessingQueue = true;

    setImmediate(() => {
      const operation = this.writeQueue.shift();
      if (operation) {
        operation();
      }
      this.isProcessingQueue = false;

      if (this.writeQueue.length > 0) {
        this.processWriteQueue();
      }
    });
  }

  private async flushWriteQueue(): Promise<void> {
    while (this.writeQueue.length > 0 || this.isProcessingQueue) {
      await new Promise((resolveTick) => setImmediate(resolveTick));
    }
  }

  // ============================================================================
  // Reads
  // ============================================================================

  listRecords(kind?: AuditRecordKind): StoredAuditRecord[] {
    const rows = kind ? this.getStatement('selectByKind').all(kind) : this.getStatement('selectAll').all();
    return rows.map(parseAuditRow);
  }

  countByKind(): Record<AuditRecordKind, number> {
    const counts: Record<AuditRecordKind, number> = {
      market_roll: 0,
      series_snapshot: 0,
      paper_submit: 0,
      telemetry_snapshot: 0,
    };
    for (const row of this.getStatement('countByKind').all()) {
      if (!isRecord(row)) {
        continue;
      }
      const kind = readString(row, 'kind');
      const count = readNumber(row, 'count');
      if (kind && isAuditRecordKind(kind) && count !== undefined) {
        counts[kind] = count;
      }
    }
    return counts;
  }

  // ============================================================================
  // Migrations
  // ============================================================================

  private runMigrations(): void {
    const db = this.database;

    let currentVersion = 0;
    const hasVersionTable = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
      .get();
    if (hasVersionTable) {
      const row = db.prepare('SELECT MAX(version) as version FROM schema_version').get();
      currentVersion = (isRecord(row) ? readNumber(row, 'version') : undefined) ?? 0;
    }

    for (const file of this.getMigrationFiles()) {
      const version = this.extractMigrationVersion(file);
      if (version > currentVersion) {
        db.exec(readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'));
      }
    }
  }

  private getMigrationFiles(): string[] {
    if (!existsSync(MIGRATIONS_DIR)) {
      return [];
    }
    return readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort((a, b) => this.extractMigrationVersion(a) - this.extractMigrationVersion(b));
  }

  private extractMigrationVersion(filename: string): number {
    const match = filename.match(/^(\d+)/);
    return match ? parseInt(match[1], 10) : 0;
  }
}
