export interface ApiErrorDetails {
  status?: number;
  cause?: unknown;
}

/**
 * Base of every typed failure the pipeline reasons about. `kind` is the
 * discriminator used for metrics and routing.
 */
export abstract class TriageError extends Error {
  abstract readonly kind: string;
  abstract readonly retryable: boolean;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** Rate limits, timeouts, 5xx and connection failures */
export class TransientAPIError extends TriageError {
  readonly kind = 'TransientAPIError';
  readonly retryable = true;
  readonly status: number | undefined;

  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details.cause);
    this.status = details.status;
  }
}

/** Authentication failures and malformed requests */
export class PermanentAPIError extends TriageError {
  readonly kind = 'PermanentAPIError';
  readonly retryable = false;
  readonly status: number | undefined;

  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, details.cause);
    this.status = details.status;
  }
}

export type ApiError = TransientAPIError | PermanentAPIError;

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}
