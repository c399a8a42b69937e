import { type Result, ok, err, toError } from './result.js';
import { logger } from './logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
}

/**
 * What a single attempt decided. `retry` with `backoff: false` re-attempts
 * immediately (e.g. a corrective re-prompt); it still spends an attempt.
 */
export type AttemptOutcome<T, E> =
  | { type: 'success'; value: T }
  | { type: 'retry'; error: E; backoff: boolean }
  | { type: 'fail'; error: E };

export type RetryStopReason = 'terminal' | 'exhausted' | 'aborted';

export interface RetrySuccess<T> {
  value: T;
  attempts: number;
}

export interface RetryFailure<E> {
  error: E;
  attempts: number;
  reason: RetryStopReason;
}

export interface RetryControls<E> {
  signal?: AbortSignal;
  /** Error reported when the signal aborts before any attempt ran */
  abortError: () => E;
  onRetry?: (attempt: number, error: E, delayMs: number) => void;
}

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

// Resolves early (never rejects) when the signal aborts
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Delay before the attempt following `failedAttempts` failures (1-based).
 */
export const calculateDelay = (failedAttempts: number, policy: RetryPolicy): number => {
  const exponentialDelay = policy.initialDelayMs * Math.pow(policy.multiplier, failedAttempts - 1);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  const jitterRange = cappedDelay * policy.jitter;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;
  return Math.max(0, Math.round(cappedDelay + jitter));
};

/**
 * Bounded attempt loop: Attempt -> Success | Retry -> Attempt | Fail.
 * The number of attempts spent is part of both outcomes.
 */
export async function withRetry<T, E>(
  step: (attempt: number) => Promise<AttemptOutcome<T, E>>,
  policy: Partial<RetryPolicy>,
  controls: RetryControls<E>
): Promise<Result<RetrySuccess<T>, RetryFailure<E>>> {
  const opts: RetryPolicy = { ...defaultRetryPolicy, ...policy };
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
  let lastError: E | undefined;
  let attempts = 0;

  while (attempts < maxAttempts) {
    if (controls.signal?.aborted) {
      return err({ error: lastError ?? controls.abortError(), attempts, reason: 'aborted' });
    }

    attempts++;
    const outcome = await step(attempts);

    if (outcome.type === 'success') {
      return ok({ value: outcome.value, attempts });
    }
    if (outcome.type === 'fail') {
      return err({ error: outcome.error, attempts, reason: 'terminal' });
    }

    lastError = outcome.error;
    if (attempts >= maxAttempts) {
      break;
    }

    const delayMs = outcome.backoff ? calculateDelay(attempts, opts) : 0;
    if (controls.onRetry) {
      controls.onRetry(attempts, outcome.error, delayMs);
    } else {
      logger.warn(
        { attempt: attempts, maxAttempts, delayMs, error: toError(outcome.error).message },
        'Retrying after error'
      );
    }
    if (delayMs > 0) {
      await sleep(delayMs, controls.signal);
    }
  }

  return err({ error: lastError ?? controls.abortError(), attempts, reason: 'exhausted' });
}
