import { z } from 'zod';

// Environment validation
const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// Storage configuration
const DatabaseConfigSchema = z.object({
  filename: z.string().min(1).default('./data/arena.db'),
  busyTimeout: z.number().int().min(0).default(5000),
  journalMode: z.enum(['wal', 'delete', 'truncate', 'memory', 'off']).default('wal'),
});

// Observability configuration
const ObservabilityConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    prettyPrint: z.boolean().default(false),
    redactPaths: z.array(z.string()).default([]),
  }).default({}),
});

// Review weighting and abuse detection
const ReputationConfigSchema = z.object({
  minUsageForReview: z.number().int().min(1).default(5),
  burst: z.object({
    reviewCount: z.number().int().min(2).default(3),
    windowMs: z.number().int().positive().default(60_000),
    dampingFactor: z.number().min(0).max(1).default(0.1),
  }).default({}),
});

// Hot ranking
const RankingConfigSchema = z.object({
  gravity: z.number().positive().default(1.8),
  refreshIntervalMs: z.number().int().min(1000).default(300_000),
  autoRefresh: z.boolean().default(false),
});

// Feed pagination
const FeedConfigSchema = z.object({
  defaultLimit: z.number().int().min(1).default(50),
  maxLimit: z.number().int().min(1).default(100),
}).refine(feed => feed.defaultLimit <= feed.maxLimit, {
  message: 'defaultLimit must not exceed maxLimit',
  path: ['defaultLimit'],
});

// Transaction retry on transient storage conflicts
const StorageConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).default(25),
});

// Root configuration schema
export const ArenaConfigSchema = z.object({
  env: NodeEnvSchema,
  database: DatabaseConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({}),
  reputation: ReputationConfigSchema.default({}),
  ranking: RankingConfigSchema.default({}),
  feed: FeedConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
});

export type ArenaConfig = z.infer<typeof ArenaConfigSchema>;
export type ArenaConfigInput = z.input<typeof ArenaConfigSchema>;
export type DatabaseSettings = z.infer<typeof DatabaseConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type ReputationConfig = z.infer<typeof ReputationConfigSchema>;
export type RankingConfig = z.infer<typeof RankingConfigSchema>;
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

/**
 * Environment variables understood by {@link ConfigLoader.fromEnv}
 */
const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional(),
  ARENA_DB_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  ARENA_HOT_REFRESH_MS: z.coerce.number().int().min(1000).optional(),
  ARENA_MIN_REVIEW_USAGE: z.coerce.number().int().min(1).optional(),
});

// Configuration loader with validation
export class ConfigLoader {
  private static instance: ArenaConfig | null = null;

  static load(raw: unknown): ArenaConfig {
    const result = ArenaConfigSchema.safeParse(raw ?? {});

    if (!result.success) {
      throw new ConfigValidationError(
        result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
      );
    }

    this.validateProductionInvariants(result.data);

    this.instance = result.data;
    return result.data;
  }

  /**
   * Build configuration from environment variables, layered over `overrides`
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: ArenaConfigInput = {}): ArenaConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
      throw new ConfigValidationError(
        parsed.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
      );
    }

    const vars = parsed.data;
    return this.load({
      ...overrides,
      env: vars.NODE_ENV ?? overrides.env,
      database: {
        ...overrides.database,
        ...(vars.ARENA_DB_PATH !== undefined ? { filename: vars.ARENA_DB_PATH } : {}),
      },
      observability: {
        ...overrides.observability,
        logging: {
          ...overrides.observability?.logging,
          ...(vars.LOG_LEVEL !== undefined ? { level: vars.LOG_LEVEL } : {}),
        },
      },
      ranking: {
        ...overrides.ranking,
        ...(vars.ARENA_HOT_REFRESH_MS !== undefined ? { refreshIntervalMs: vars.ARENA_HOT_REFRESH_MS } : {}),
      },
      reputation: {
        ...overrides.reputation,
        ...(vars.ARENA_MIN_REVIEW_USAGE !== undefined ? { minUsageForReview: vars.ARENA_MIN_REVIEW_USAGE } : {}),
      },
    });
  }

  static get(): ArenaConfig {
    if (!this.instance) {
      throw new Error('Configuration not loaded. Call ConfigLoader.load() first.');
    }
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }

  private static validateProductionInvariants(config: ArenaConfig): void {
    if (config.env === 'production') {
      if (config.database.filename === ':memory:') {
        throw new ConfigValidationError([
          { path: 'database.filename', message: 'In-memory database is not allowed in production' },
        ]);
      }
      if (config.observability.logging.prettyPrint) {
        throw new ConfigValidationError([
          { path: 'observability.logging.prettyPrint', message: 'Pretty printing must be disabled in production' },
        ]);
      }
    }
  }
}

/**
 * Configuration validation error
 * Supports both string[] and {path, message}[] formats
 */
export class ConfigValidationError extends Error {
  public readonly errors: Array<{ path: string; message: string }>;

  constructor(errors: string[] | Array<{ path: string; message: string }>) {
    const normalizedErrors = errors.map(e => {
      if (typeof e === 'string') {
        return { path: '', message: e };
      }
      return e;
    });

    const message = normalizedErrors.map(e =>
      e.path ? `${e.path}: ${e.message}` : e.message
    ).join(', ');

    super(`Configuration validation failed: ${message}`);
    this.name = 'ConfigValidationError';
    this.errors = normalizedErrors;
  }
}
