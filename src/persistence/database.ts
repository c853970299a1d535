import type { Logger } from 'pino';
import { getModuleLogger } from '../observability/logger.js';

const logger = (): Logger => getModuleLogger('Database');

// ============================================================================
// Database Abstraction Layer
// ============================================================================

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  /** Database type */
  type: 'sqlite';
  /** Connection string (for sqlite: file path) */
  connectionString?: string;
  /** Enable query logging */
  logging?: boolean;
}

/**
 * Query result
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
  duration: number;
}

/**
 * Anything that can run a parameterised statement: an adapter or an open transaction
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
  /** Begin a transaction */
  beginTransaction(): Promise<Transaction>;
  /** Check if connected */
  isConnected(): boolean;
  /** Get connection stats */
  getStats(): { connections: number; queries: number; errors: number };
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Driver error codes that indicate a conflict worth retrying
 */
const TRANSIENT_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_BUSY_SNAPSHOT',
  'SQLITE_BUSY_RECOVERY',
  'SQLITE_LOCKED',
  'SQLITE_LOCKED_SHAREDCACHE',
]);

/**
 * Error raised by a database adapter, keeping the driver's error code
 */
export class DatabaseError extends Error {
  readonly code: string | undefined;
  readonly sql: string | undefined;

  constructor(message: string, code?: string, sql?: string) {
    super(message);
    this.name = 'DatabaseError';
    this.code = code;
    this.sql = sql;
  }

  get transient(): boolean {
    return this.code !== undefined && TRANSIENT_CODES.has(this.code);
  }

  get uniqueViolation(): boolean {
    return this.code === 'SQLITE_CONSTRAINT_UNIQUE' || this.code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
  }
}

/**
 * Read the driver error code off an unknown thrown value
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isTransientDatabaseError(error: unknown): boolean {
  return error instanceof DatabaseError && error.transient;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run `work` inside a transaction, committing on success and rolling back on failure
 */
export async function withTransaction<T>(
  db: DatabaseAdapter,
  work: (tx: Transaction) => Promise<T>
): Promise<T> {
  const tx = await db.beginTransaction();

  let result: T;
  try {
    result = await work(tx);
  } catch (error) {
    await rollbackQuietly(tx, error);
    throw error;
  }

  try {
    await tx.commit();
  } catch (error) {
    await rollbackQuietly(tx, error);
    throw error;
  }

  return result;
}

async function rollbackQuietly(tx: Transaction, cause: unknown): Promise<void> {
  try {
    await tx.rollback();
  } catch (rollbackError) {
    logger().error(
      {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        cause: cause instanceof Error ? cause.message : String(cause),
      },
      'Transaction rollback failed'
    );
  }
}
