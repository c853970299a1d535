export {
  retry,
  calculateDelay,
  resolveRetryConfig,
  retryOnAnyError,
  RetryExhaustedError,
  type RetryConfig,
  type RetryAttempt,
} from './retry.js';

export { Semaphore } from './semaphore.js';
