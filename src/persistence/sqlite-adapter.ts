import Database from 'better-sqlite3';
import {
  DatabaseError,
  errorCodeOf,
  type DatabaseAdapter,
  type DatabaseConfig,
  type QueryResult,
  type Transaction,
} from './database.js';
import { Semaphore } from '../resilience/semaphore.js';
import type { Logger } from 'pino';
import { getModuleLogger } from '../observability/logger.js';

const logger = (): Logger => getModuleLogger('SQLiteAdapter');

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

// ============================================================================
// Statement execution
// ============================================================================

/**
 * better-sqlite3 only binds numbers, strings, bigints, buffers and null
 */
function toBindable(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function wrapError(error: unknown, sql: string): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DatabaseError(`SQLite query failed: ${message}`, errorCodeOf(error), sql);
}

function runStatement<T>(stmt: Database.Statement, params: unknown[]): QueryResult<T> {
  const start = Date.now();
  const bound = params.map(toBindable);

  if (stmt.reader) {
    const rows = stmt.all(...bound) as T[];
    return {
      rows,
      rowCount: rows.length,
      duration: Date.now() - start,
    };
  }

  const result = stmt.run(...bound);
  return {
    rows: [],
    rowCount: result.changes,
    duration: Date.now() - start,
  };
}

// ============================================================================
// SQLite Transaction
// ============================================================================

/**
 * A `BEGIN IMMEDIATE` transaction. Holds the adapter's connection permit until
 * it commits or rolls back, so nothing else on the connection can interleave.
 */
class SQLiteTransaction implements Transaction {
  private completed = false;

  constructor(
    private readonly db: Database.Database,
    private readonly prepare: (sql: string) => Database.Statement,
    private readonly onQuery: (failed: boolean) => void,
    private readonly releasePermit: () => void
  ) {}

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    if (this.completed) {
      throw new DatabaseError('Transaction already completed', undefined, sql);
    }

    try {
      const result = runStatement<T>(this.prepare(sql), params);
      this.onQuery(false);
      return result;
    } catch (error) {
      this.onQuery(true);
      throw wrapError(error, sql);
    }
  }

  async commit(): Promise<void> {
    if (this.completed) {
      throw new DatabaseError('Transaction already completed');
    }

    try {
      this.db.exec('COMMIT');
    } catch (error) {
      // Left open so the caller can roll back
      throw wrapError(error, 'COMMIT');
    }

    this.finish();
  }

  async rollback(): Promise<void> {
    if (this.completed) {
      return;
    }

    try {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
    } catch (error) {
      throw wrapError(error, 'ROLLBACK');
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    this.completed = true;
    this.releasePermit();
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
  private readonly connectionLock = new Semaphore(1);
  private queryCount = 0;
  private errorCount = 0;

  constructor(config: SQLiteConfig) {
    this.config = {
      filename: config.filename ?? config.connectionString ?? ':memory:',
      busyTimeout: config.busyTimeout ?? 5000,
      journalMode: config.journalMode ?? 'wal',
      synchronous: config.synchronous ?? 'normal',
      cacheSize: config.cacheSize ?? -64000, // 64MB
      foreignKeys: config.foreignKeys ?? true,
      readonly: config.readonly ?? false,
      logging: config.logging ?? false,
    };
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

      // Configure database
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
      this.db.pragma(`journal_mode = ${this.config.journalMode}`);
      this.db.pragma(`synchronous = ${this.config.synchronous}`);
      this.db.pragma(`cache_size = ${this.config.cacheSize}`);
      this.db.pragma(`foreign_keys = ${this.config.foreignKeys ? 'ON' : 'OFF'}`);

      logger().info({ filename: this.config.filename }, 'SQLite database connected');
    } catch (error) {
      this.errorCount++;
      const message = error instanceof Error ? error.message : String(error);
      logger().error({ error: message }, 'Failed to connect to SQLite database');
      throw new DatabaseError(`SQLite connection failed: ${message}`, errorCodeOf(error));
    }
  }

  async disconnect(): Promise<void> {
    if (!this.db) {
      return;
    }

    await this.connectionLock.run(async () => {
      this.statementCache.clear();
      this.db?.close();
      this.db = null;
    });

    logger().info('SQLite database disconnected');
  }

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    return this.connectionLock.run(async () => {
      const stmt = this.getStatement(sql);
      try {
        const result = runStatement<T>(stmt, params);
        this.recordQuery(false, sql, result.duration);
        return result;
      } catch (error) {
        this.recordQuery(true, sql);
        const wrapped = wrapError(error, sql);
        logger().error({ sql, code: wrapped.code, error: wrapped.message }, 'SQLite query failed');
        throw wrapped;
      }
    });
  }

  async beginTransaction(): Promise<Transaction> {
    await this.connectionLock.acquire();

    try {
      const db = this.requireConnection();
      db.exec('BEGIN IMMEDIATE');
      return new SQLiteTransaction(
        db,
        sql => this.getStatement(sql),
        failed => this.recordQuery(failed),
        () => this.connectionLock.release()
      );
    } catch (error) {
      this.connectionLock.release();
      this.errorCount++;
      throw wrapError(error, 'BEGIN IMMEDIATE');
    }
  }

  /**
   * Run one or more statements without parameters (schema setup)
   */
  async execute(sql: string): Promise<void> {
    await this.connectionLock.run(async () => {
      try {
        this.requireConnection().exec(sql);
      } catch (error) {
        this.errorCount++;
        const message = error instanceof Error ? error.message : String(error);
        throw new DatabaseError(`SQLite execute failed: ${message}`, errorCodeOf(error), sql);
      }
    });
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

  private recordQuery(failed: boolean, sql?: string, duration?: number): void {
    this.queryCount++;
    if (failed) {
      this.errorCount++;
    } else if (this.config.logging && sql !== undefined) {
      logger().debug({ sql, duration }, 'SQLite query executed');
    }
  }

  private requireConnection(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not connected');
    }
    return this.db;
  }

  private getStatement(sql: string): Database.Statement {
    const db = this.requireConnection();

    let stmt = this.statementCache.get(sql);
    if (!stmt) {
      try {
        stmt = db.prepare(sql);
      } catch (error) {
        this.errorCount++;
        throw wrapError(error, sql);
      }
      this.statementCache.set(sql, stmt);
    }
    return stmt;
  }
}
