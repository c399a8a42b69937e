import { TriageError, TransientAPIError, PermanentAPIError } from '@inbox-triage/integrations';

export { TriageError, TransientAPIError, PermanentAPIError };

export const ErrorKind = {
  TRANSIENT_API: 'TransientAPIError',
  PERMANENT_API: 'PermanentAPIError',
  VALIDATION: 'ValidationError',
  CIRCUIT_OPEN: 'CircuitOpenError',
  GUARDRAIL: 'GuardrailFailure',
  ITEM_PROCESSING: 'ItemProcessingError',
} as const;
export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Model output that does not match the requested schema */
export class ValidationError extends TriageError {
  readonly kind = ErrorKind.VALIDATION;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly rawOutput: string,
    public readonly issues: readonly string[]
  ) {
    super(message);
  }
}

/** The breaker rejected the call without contacting the model */
export class CircuitOpenError extends TriageError {
  readonly kind = ErrorKind.CIRCUIT_OPEN;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly retryInMs: number
  ) {
    super(message);
  }
}

export type GuardrailRule = 'empty' | 'max_length' | 'sensitive_echo' | 'placeholder';

export interface GuardrailViolation {
  rule: GuardrailRule;
  message: string;
}

/** A drafted reply was rejected by content checks */
export class GuardrailFailure extends TriageError {
  readonly kind = ErrorKind.GUARDRAIL;
  readonly retryable = false;

  constructor(public readonly violations: readonly GuardrailViolation[]) {
    super(`Draft rejected: ${violations.map((v) => v.rule).join(', ')}`);
  }
}

/** Anything unexpected while processing one email; contained by the pipeline */
export class ItemProcessingError extends TriageError {
  readonly kind = ErrorKind.ITEM_PROCESSING;
  readonly retryable = false;

  constructor(
    public readonly emailId: string,
    cause: unknown
  ) {
    super(`Processing failed for email ${emailId}: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
  }
}

export type GatewayError = TransientAPIError | PermanentAPIError | ValidationError | CircuitOpenError;

export function errorKindOf(error: unknown): ErrorKind {
  if (
    error instanceof TransientAPIError ||
    error instanceof PermanentAPIError ||
    error instanceof ValidationError ||
    error instanceof CircuitOpenError ||
    error instanceof GuardrailFailure
  ) {
    return error.kind;
  }
  return ErrorKind.ITEM_PROCESSING;
}
