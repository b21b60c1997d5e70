import type { Logger } from 'pino';

// ============================================================================
// Database Abstraction Layer
// ============================================================================

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  /** Connection string (for sqlite: file path) */
  connectionString?: string;
  /** Enable query logging */
  logging?: boolean;
  /** Connection timeout in milliseconds */
  connectionTimeout?: number;
}

/**
 * Query result
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
  /** Row id of the last inserted row, for INSERT statements */
  lastInsertId?: number;
  duration: number;
}

/**
 * Anything that can run a parameterized statement
 */
export interface Queryable {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Transaction interface
 */
export interface Transaction extends Queryable {
  /** Commit the transaction */
  commit(): Promise<void>;
  /** Rollback the transaction */
  rollback(): Promise<void>;
}

/**
 * Database adapter interface
 */
export interface DatabaseAdapter extends Queryable {
  /** Connect to the database */
  connect(): Promise<void>;
  /** Disconnect from the database */
  disconnect(): Promise<void>;
  /** Execute one or more statements without parameters */
  execute(sql: string): Promise<void>;
  /** Begin a transaction */
  beginTransaction(): Promise<Transaction>;
  /**
   * Run work inside a transaction. Transactions on one adapter never overlap;
   * the work commits when it resolves and rolls back when it throws.
   */
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
  /** Check if connected */
  isConnected(): boolean;
  /** Get connection stats */
  getStats(): { connections: number; queries: number; errors: number };
}

// ============================================================================
// Storage Errors
// ============================================================================

export type StorageErrorCode =
  | 'CONNECTION_FAILED'
  | 'NOT_CONNECTED'
  | 'QUERY_FAILED'
  | 'CONSTRAINT_VIOLATION'
  | 'TRANSACTION_FAILED'
  | 'SCHEMA_FAILED';

/** The backing store rejected or failed a statement */
export class StorageError extends Error {
  readonly code: StorageErrorCode;
  /** Driver error code, e.g. SQLITE_CONSTRAINT_UNIQUE */
  readonly driverCode?: string;
  readonly timestamp: number;

  constructor(
    code: StorageErrorCode,
    message: string,
    options: { driverCode?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.code = code;
    this.driverCode = options.driverCode;
    this.timestamp = Date.now();
  }

  /** True for a UNIQUE or PRIMARY KEY violation */
  isUniqueViolation(): boolean {
    return this.driverCode === 'SQLITE_CONSTRAINT_UNIQUE'
      || this.driverCode === 'SQLITE_CONSTRAINT_PRIMARYKEY';
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      driverCode: this.driverCode,
      timestamp: this.timestamp,
    };
  }
}

/** Type guard for StorageError */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Row id reported by an INSERT
 */
export function insertedId(result: QueryResult): number {
  if (result.lastInsertId === undefined) {
    throw new StorageError('QUERY_FAILED', 'Insert did not report a row id');
  }
  return result.lastInsertId;
}

/**
 * Run a read and degrade to a fallback value when storage fails.
 * Anything other than a StorageError propagates.
 */
export async function readOrDefault<T>(
  logger: Logger,
  operation: string,
  fallback: T,
  read: () => Promise<T>,
  context: Record<string, unknown> = {}
): Promise<T> {
  try {
    return await read();
  } catch (error) {
    if (!isStorageError(error)) {
      throw error;
    }
    logger.error({ ...context, operation, code: error.code, error: error.message }, 'Read failed, returning empty result');
    return fallback;
  }
}
