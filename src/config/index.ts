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
} from './schema.js';
