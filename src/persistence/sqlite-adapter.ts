import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import {
  StorageError,
  type DatabaseAdapter,
  type DatabaseConfig,
  type Queryable,
  type QueryResult,
  type StorageErrorCode,
  type Transaction,
} from './database.js';
import { getLogger } from '../observability/logger.js';

// ============================================================================
// SQLite Configuration
// ============================================================================

export interface SQLiteConfig extends DatabaseConfig {
  /** Path to SQLite file (use ":memory:" for in-memory) */
  filename?: string;
  /** Milliseconds to wait for lock */
  busyTimeout?: number;
  /** Journal mode */
  journalMode?: 'wal' | 'delete' | 'truncate' | 'memory' | 'off';
  /** Synchronous setting */
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  /** Cache size in pages (negative = KB) */
  cacheSize?: number;
  /** Enable foreign keys */
  foreignKeys?: boolean;
  /** Enable read-only mode */
  readonly?: boolean;
}

function driverCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toStorageError(error: unknown, fallback: StorageErrorCode, prefix: string): StorageError {
  const message = error instanceof Error ? error.message : String(error);
  const driverCode = driverCodeOf(error);
  const code = driverCode?.startsWith('SQLITE_CONSTRAINT') ? 'CONSTRAINT_VIOLATION' : fallback;
  return new StorageError(code, `${prefix}: ${message}`, { driverCode, cause: error });
}

function runStatement<T>(stmt: Database.Statement, params: unknown[]): Omit<QueryResult<T>, 'duration'> {
  if (stmt.reader) {
    const rows = stmt.all(...params) as T[];
    return { rows, rowCount: rows.length };
  }

  const result = stmt.run(...params);
  return {
    rows: [],
    rowCount: result.changes,
    lastInsertId: Number(result.lastInsertRowid),
  };
}

// ============================================================================
// SQLite Transaction
// ============================================================================

class SQLiteTransaction implements Transaction {
  private committed = false;
  private rolledBack = false;

  constructor(
    private readonly db: Database.Database,
    private readonly statementCache: Map<string, Database.Statement>,
    private readonly onQueryError: (sql: string, error: StorageError) => void
  ) {
    this.db.exec('BEGIN IMMEDIATE');
  }

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    if (this.committed || this.rolledBack) {
      throw new StorageError('TRANSACTION_FAILED', 'Transaction already completed');
    }

    const start = Date.now();

    try {
      const stmt = this.getStatement(sql);
      return { ...runStatement<T>(stmt, params), duration: Date.now() - start };
    } catch (error) {
      const storageError = toStorageError(error, 'QUERY_FAILED', 'SQLite query failed');
      this.onQueryError(sql, storageError);
      throw storageError;
    }
  }

  async commit(): Promise<void> {
    if (this.committed || this.rolledBack) {
      throw new StorageError('TRANSACTION_FAILED', 'Transaction already completed');
    }
    try {
      this.db.exec('COMMIT');
    } catch (error) {
      throw toStorageError(error, 'TRANSACTION_FAILED', 'SQLite commit failed');
    }
    this.committed = true;
  }

  async rollback(): Promise<void> {
    if (this.committed || this.rolledBack) {
      return;
    }
    this.rolledBack = true;
    // SQLite may already have rolled back on its own (e.g. SQLITE_FULL)
    if (this.db.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  private getStatement(sql: string): Database.Statement {
    let stmt = this.statementCache.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.statementCache.set(sql, stmt);
    }
    return stmt;
  }
}

// ============================================================================
// SQLite Database Adapter
// ============================================================================

interface SQLiteInternalConfig {
  filename: string;
  busyTimeout: number;
  journalMode: 'wal' | 'delete' | 'truncate' | 'memory' | 'off';
  synchronous: 'off' | 'normal' | 'full' | 'extra';
  cacheSize: number;
  foreignKeys: boolean;
  readonly: boolean;
  logging: boolean;
}

export class SQLiteDatabaseAdapter implements DatabaseAdapter {
  private db: Database.Database | null = null;
  private readonly config: SQLiteInternalConfig;
  private readonly statementCache = new Map<string, Database.Statement>();
  private readonly logger: Logger;
  private queryCount = 0;
  private errorCount = 0;
  private transactionQueue: Promise<void> = Promise.resolve();

  constructor(config: SQLiteConfig = {}) {
    this.config = {
      filename: config.filename ?? config.connectionString ?? ':memory:',
      busyTimeout: config.busyTimeout ?? config.connectionTimeout ?? 5000,
      journalMode: config.journalMode ?? 'wal',
      synchronous: config.synchronous ?? 'normal',
      cacheSize: config.cacheSize ?? -64000, // 64MB
      foreignKeys: config.foreignKeys ?? true,
      readonly: config.readonly ?? false,
      logging: config.logging ?? false,
    };
    this.logger = getLogger().child({ module: 'SQLiteAdapter' });
  }

  async connect(): Promise<void> {
    if (this.db) {
      return;
    }

    try {
      this.db = new Database(this.config.filename, {
        readonly: this.config.readonly,
        fileMustExist: false,
      });

      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
      this.db.pragma(`journal_mode = ${this.config.journalMode}`);
      this.db.pragma(`synchronous = ${this.config.synchronous}`);
      this.db.pragma(`cache_size = ${this.config.cacheSize}`);
      this.db.pragma(`foreign_keys = ${this.config.foreignKeys ? 'ON' : 'OFF'}`);

      this.logger.info({ filename: this.config.filename }, 'SQLite database connected');
    } catch (error) {
      this.errorCount++;
      this.db = null;
      const storageError = toStorageError(error, 'CONNECTION_FAILED', 'SQLite connection failed');
      this.logger.error({ filename: this.config.filename, error: storageError.message }, 'Failed to connect to SQLite database');
      throw storageError;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.db) {
      return;
    }

    // Let a running transaction finish before closing the handle
    await this.transactionQueue;

    this.statementCache.clear();
    this.db.close();
    this.db = null;

    this.logger.info('SQLite database disconnected');
  }

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    // Reads outside a transaction must not see another transaction's uncommitted rows
    await this.transactionQueue;
    const db = this.requireConnection();

    this.queryCount++;
    const start = Date.now();

    try {
      const stmt = this.getStatement(db, sql);
      const result = runStatement<T>(stmt, params);
      const duration = Date.now() - start;
      if (this.config.logging) {
        this.logger.debug({ sql, rowCount: result.rowCount, duration }, 'SQLite query');
      }
      return { ...result, duration };
    } catch (error) {
      const storageError = toStorageError(error, 'QUERY_FAILED', 'SQLite query failed');
      this.recordQueryError(sql, storageError);
      throw storageError;
    }
  }

  async beginTransaction(): Promise<Transaction> {
    const db = this.requireConnection();
    try {
      return new SQLiteTransaction(db, this.statementCache, (sql, error) => this.recordQueryError(sql, error));
    } catch (error) {
      this.errorCount++;
      throw toStorageError(error, 'TRANSACTION_FAILED', 'SQLite begin failed');
    }
  }

  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const tx = await this.beginTransaction();
      try {
        const result = await work(tx);
        await tx.commit();
        return result;
      } catch (error) {
        await tx.rollback();
        if (this.config.logging) {
          this.logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Transaction rolled back');
        }
        throw error;
      }
    };

    const pending = this.transactionQueue.then(run);
    this.transactionQueue = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  async execute(sql: string): Promise<void> {
    await this.transactionQueue;
    const db = this.requireConnection();

    try {
      db.exec(sql);
    } catch (error) {
      this.errorCount++;
      throw toStorageError(error, 'QUERY_FAILED', 'SQLite execute failed');
    }
  }

  isConnected(): boolean {
    return this.db !== null && this.db.open;
  }

  getStats(): { connections: number; queries: number; errors: number } {
    return {
      connections: this.db ? 1 : 0,
      queries: this.queryCount,
      errors: this.errorCount,
    };
  }

  private recordQueryError(sql: string, error: StorageError): void {
    this.errorCount++;
    this.logger.error({ sql, error: error.message }, 'SQLite query failed');
  }

  private requireConnection(): Database.Database {
    if (!this.db) {
      throw new StorageError('NOT_CONNECTED', 'Database not connected');
    }
    return this.db;
  }

  private getStatement(db: Database.Database, sql: string): Database.Statement {
    let stmt = this.statementCache.get(sql);
    if (!stmt) {
      stmt = db.prepare(sql);
      this.statementCache.set(sql, stmt);
    }
    return stmt;
  }
}
