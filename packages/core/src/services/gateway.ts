import type { Result, CircuitStats, RetryStopReason } from '@inbox-triage/utils';
import type { GatewayError } from '../errors.js';
import type { PromptSpec } from './prompts.js';

export interface InvokeOptions {
  // Per-attempt deadline; defaults to the configured request timeout
  timeoutMs?: number;
  // Run-level cancellation: stops new attempts, never aborts one in flight
  signal?: AbortSignal;
}

export interface GatewayOutput<T> {
  value: T;
  rawOutput: string;
  attempts: number;
}

export interface GatewayFailure {
  error: GatewayError;
  attempts: number;
  // 'aborted' means the run signal stopped further attempts
  reason: RetryStopReason;
  // Last text the model returned, if it answered at all
  rawOutput: string | null;
}

// Cancelled before any attempt, so there is no remote failure to report
export const cancelledBeforeCall = (failure: GatewayFailure): boolean =>
  failure.reason === 'aborted' && failure.attempts === 0;

/**
 * Sole path to the remote model. Owns timeouts, retry, the circuit breaker
 * and schema validation of the model's answer.
 */
export interface IModelGateway {
  invoke<T>(prompt: PromptSpec<T>, options?: InvokeOptions): Promise<Result<GatewayOutput<T>, GatewayFailure>>;

  breakerStats(): CircuitStats;
}
