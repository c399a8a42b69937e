// Result type
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  isOk,
  isErr,
  tryCatch,
  toError,
} from './result.js';

// Retry state machine
export {
  type RetryPolicy,
  type AttemptOutcome,
  type RetryStopReason,
  type RetrySuccess,
  type RetryFailure,
  type RetryControls,
  withRetry,
  sleep,
  calculateDelay,
  defaultRetryPolicy,
} from './retry.js';

// Logger
export {
  type Logger,
  type LogLevel,
  type LogContext,
  logger,
  createLogger,
  createChildLogger,
} from './logger.js';

// Circuit Breaker
export {
  type CircuitState,
  type CircuitStats,
  type CircuitBreakerOptions,
  type CircuitBreakerError,
  CircuitBreaker,
  createCircuitBreaker,
  isCircuitOpen,
} from './circuit-breaker.js';

// Timeouts and concurrency
export { TimeoutError, withTimeout } from './timeout.js';
export { WorkerPool, mapWithConcurrency } from './worker-pool.js';
