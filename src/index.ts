// Configuration
export {
  ArenaConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  type ArenaConfig,
  type ArenaConfigInput,
  type DatabaseSettings,
  type ObservabilityConfig,
  type ReputationConfig,
  type RankingConfig,
  type FeedConfig,
  type StorageConfig,
} from './config/index.js';

// Observability
export {
  createLogger,
  getLogger,
  getModuleLogger,
  initLogger,
  redactSensitiveStrings,
  type LoggerConfig,
  type LogLevel,
} from './observability/index.js';

// Persistence
export {
  DatabaseError,
  SQLiteDatabaseAdapter,
  isTransientDatabaseError,
  withTransaction,
  type DatabaseAdapter,
  type DatabaseConfig,
  type Queryable,
  type QueryResult,
  type SQLiteConfig,
  type Transaction,
} from './persistence/index.js';

// Resilience
export {
  retry,
  RetryExhaustedError,
  Semaphore,
  type RetryConfig,
} from './resilience/index.js';

// Arena
export * from './arena/index.js';
