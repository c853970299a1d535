// Database
export {
  DatabaseError,
  errorCodeOf,
  isTransientDatabaseError,
  withTransaction,
  type DatabaseConfig,
  type DatabaseAdapter,
  type Queryable,
  type QueryResult,
  type Transaction,
} from './database.js';

// SQLite Adapter
export {
  SQLiteDatabaseAdapter,
  type SQLiteConfig,
} from './sqlite-adapter.js';
