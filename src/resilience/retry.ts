import type { Logger } from 'pino';
import { getModuleLogger } from '../observability/logger.js';

const logger = (): Logger => getModuleLogger('Retry');

// ============================================================================
// Retry Types
// ============================================================================

/**
 * Retry configuration. Delays grow exponentially from `initialDelay`.
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first */
  maxAttempts?: number;
  /** Initial delay in ms */
  initialDelay?: number;
  /** Maximum delay in ms */
  maxDelay?: number;
  /** Multiplier for exponential backoff */
  multiplier?: number;
  /** Predicate to determine if error is retryable */
  retryIf?: (error: unknown, attempt: number) => boolean;
  /** Callback before each retry */
  onRetry?: (info: { error: unknown; attempt: number; delay: number }) => void;
}

/**
 * Individual retry attempt info
 */
export interface RetryAttempt {
  attempt: number;
  timestamp: number;
  duration: number;
  error?: unknown;
  delay?: number;
}

// ============================================================================
// Retry Errors
// ============================================================================

/**
 * Error thrown when all retries exhausted
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;
  readonly history: RetryAttempt[];

  constructor(attempts: number, lastError: unknown, history: RetryAttempt[]) {
    super(`All ${attempts} retry attempts exhausted`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
    this.history = history;
  }
}

// ============================================================================
// Delay Calculation
// ============================================================================

type ResolvedRetryConfig = Required<Omit<RetryConfig, 'onRetry'>> & Pick<RetryConfig, 'onRetry'>;

/**
 * Backoff before the retry that follows `attempt`
 */
export function calculateDelay(attempt: number, config: ResolvedRetryConfig): number {
  const delay = config.initialDelay * Math.pow(config.multiplier, attempt - 1);
  return Math.min(Math.max(0, delay), config.maxDelay);
}

/**
 * Default predicate - retry on any error
 */
export function retryOnAnyError(): boolean {
  return true;
}

// ============================================================================
// Retry Implementation
// ============================================================================

export function resolveRetryConfig(config: RetryConfig = {}): ResolvedRetryConfig {
  return {
    maxAttempts: config.maxAttempts ?? 3,
    initialDelay: config.initialDelay ?? 1000,
    maxDelay: config.maxDelay ?? 30000,
    multiplier: config.multiplier ?? 2,
    retryIf: config.retryIf ?? retryOnAnyError,
    onRetry: config.onRetry,
  };
}

/**
 * Execute an operation with retry logic.
 *
 * Errors rejected by `retryIf` are rethrown as-is on the attempt that raised
 * them; a retryable error on the final attempt raises {@link RetryExhaustedError}.
 */
export async function retry<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {}
): Promise<T> {
  const fullConfig = resolveRetryConfig(config);
  const history: RetryAttempt[] = [];
  let lastError: unknown;

  for (let attempt = 1; attempt <= fullConfig.maxAttempts; attempt++) {
    const attemptStart = Date.now();

    try {
      return await operation();
    } catch (error) {
      lastError = error;
      const duration = Date.now() - attemptStart;

      if (!fullConfig.retryIf(error, attempt)) {
        throw error;
      }

      if (attempt >= fullConfig.maxAttempts) {
        history.push({ attempt, timestamp: attemptStart, duration, error });
        break;
      }

      const delay = calculateDelay(attempt, fullConfig);
      history.push({ attempt, timestamp: attemptStart, duration, error, delay });

      logger().debug({
        attempt,
        maxAttempts: fullConfig.maxAttempts,
        delay,
        error: error instanceof Error ? error.message : String(error),
      }, 'Retry attempt failed, will retry');

      fullConfig.onRetry?.({ error, attempt, delay });

      await sleep(delay);
    }
  }

  throw new RetryExhaustedError(fullConfig.maxAttempts, lastError, history);
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise(resolve => setTimeout(resolve, ms));
}
