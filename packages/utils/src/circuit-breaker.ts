import { type Result, ok, err, toError } from './result.js';
import { logger } from './logger.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive counted failures that open the circuit */
  failureThreshold: number;
  /** How long the circuit stays open before admitting a single probe */
  cooldownMs: number;
  /**
   * Decides whether a thrown error counts toward the threshold. Errors that
   * do not count still surface to the caller but leave the circuit healthy.
   */
  isFailure?: (error: Error) => boolean;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerError {
  type: 'circuit_open';
  message: string;
  circuitName: string;
  retryInMs: number;
}

export interface CircuitStats {
  state: CircuitState;
  consecutiveFailures: number;
  probeInFlight: boolean;
  openedAt: number | undefined;
}

/**
 * Shared across every caller of one remote dependency. All transitions run
 * synchronously between awaits, so concurrent callers observe them atomically.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private openedAt: number | undefined;
  private probeInFlight = false;
  private readonly options: CircuitBreakerOptions;

  constructor(options: CircuitBreakerOptions) {
    this.options = options;
  }

  async execute<T>(fn: () => Promise<T>): Promise<Result<T, CircuitBreakerError | Error>> {
    const admission = this.admit();
    if (!admission.ok) {
      return admission;
    }
    const isProbe = admission.value;

    try {
      const result = await fn();
      this.onSuccess(isProbe);
      return ok(result);
    } catch (e) {
      const error = toError(e);
      const counts = this.options.isFailure?.(error) ?? true;
      if (counts) {
        this.onFailure(isProbe);
      } else {
        this.onSuccess(isProbe);
      }
      return err(error);
    }
  }

  /**
   * Gate a call. Ok(true) marks the single half-open probe.
   */
  private admit(): Result<boolean, CircuitBreakerError> {
    if (this.state === 'closed') {
      return ok(false);
    }

    if (this.state === 'open') {
      const remaining = this.cooldownRemaining();
      if (remaining > 0) {
        return err(this.openError(remaining));
      }
      this.transitionTo('half-open');
    }

    if (this.probeInFlight) {
      return err(this.openError(0));
    }
    this.probeInFlight = true;
    return ok(true);
  }

  private onSuccess(isProbe: boolean): void {
    this.consecutiveFailures = 0;
    if (isProbe) {
      this.probeInFlight = false;
      this.openedAt = undefined;
      this.transitionTo('closed');
    }
  }

  private onFailure(isProbe: boolean): void {
    this.consecutiveFailures++;

    if (isProbe) {
      this.probeInFlight = false;
      this.openedAt = Date.now();
      this.transitionTo('open');
    } else if (this.state === 'closed' && this.consecutiveFailures >= this.options.failureThreshold) {
      this.openedAt = Date.now();
      this.transitionTo('open');
    }
  }

  private cooldownRemaining(): number {
    if (this.openedAt === undefined) return 0;
    return Math.max(0, this.openedAt + this.options.cooldownMs - Date.now());
  }

  private openError(retryInMs: number): CircuitBreakerError {
    return {
      type: 'circuit_open',
      message: `Circuit breaker '${this.options.name}' is open`,
      circuitName: this.options.name,
      retryInMs,
    };
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    if (oldState === newState) return;
    this.state = newState;

    logger.info(
      { circuitName: this.options.name, from: oldState, to: newState },
      'Circuit breaker state change'
    );

    this.options.onStateChange?.(this.options.name, oldState, newState);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitStats {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      probeInFlight: this.probeInFlight,
      openedAt: this.openedAt,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.consecutiveFailures = 0;
    this.openedAt = undefined;
    this.probeInFlight = false;
  }
}

export function isCircuitOpen(error: CircuitBreakerError | Error): error is CircuitBreakerError {
  return !(error instanceof Error) && error.type === 'circuit_open';
}

export function createCircuitBreaker(
  name: string,
  options?: Partial<Omit<CircuitBreakerOptions, 'name'>>
): CircuitBreaker {
  return new CircuitBreaker({
    name,
    failureThreshold: 5,
    cooldownMs: 30000,
    ...options,
  });
}
