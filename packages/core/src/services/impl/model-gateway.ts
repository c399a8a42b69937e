import {
  type AttemptOutcome,
  type CircuitBreaker,
  type CircuitStats,
  type Result,
  ok,
  err,
  createCircuitBreaker,
  createLogger,
  isCircuitOpen,
  withRetry,
  withTimeout,
  TimeoutError,
} from '@inbox-triage/utils';
import type { GatewaySettings } from '@inbox-triage/config';
import type { ChatMessage, CompletionRequest, ModelTransport } from '@inbox-triage/integrations';
import {
  type GatewayError,
  CircuitOpenError,
  PermanentAPIError,
  TransientAPIError,
  ValidationError,
} from '../../errors.js';
import type { GatewayFailure, GatewayOutput, IModelGateway, InvokeOptions } from '../gateway.js';
import type { PromptSpec } from '../prompts.js';
import { parseModelOutput } from './json-output.js';

const logger = createLogger({ service: 'model-gateway' });

interface Validated<T> {
  value: T;
  rawOutput: string;
}

function normalizeTransportError(error: unknown): TransientAPIError | PermanentAPIError {
  if (error instanceof TransientAPIError || error instanceof PermanentAPIError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new TransientAPIError(error.message, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientAPIError(`Model transport failed: ${message}`, { cause: error });
}

function correctionMessages(schemaDescription: string, rawOutput: string, issues: readonly string[]): ChatMessage[] {
  return [
    { role: 'assistant', content: rawOutput },
    {
      role: 'user',
      content: `Your previous answer did not match the required format:
${issues.map((issue) => `- ${issue}`).join('\n')}

Reply again with ONLY valid JSON matching this schema:
${schemaDescription}`,
    },
  ];
}

/**
 * Wraps a ModelTransport with per-attempt timeouts, bounded retry with
 * backoff, a shared circuit breaker and structured-output validation with a
 * single corrective re-prompt.
 */
export class ModelGateway implements IModelGateway {
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly transport: ModelTransport,
    private readonly settings: GatewaySettings
  ) {
    this.breaker = createCircuitBreaker(`model:${transport.name}`, {
      failureThreshold: settings.breakerThreshold,
      cooldownMs: settings.breakerCooldownMs,
      // Permanent errors and malformed answers mean the service is up
      isFailure: (error) => error instanceof TransientAPIError,
    });
  }

  breakerStats(): CircuitStats {
    return this.breaker.getStats();
  }

  async invoke<T>(
    prompt: PromptSpec<T>,
    options: InvokeOptions = {}
  ): Promise<Result<GatewayOutput<T>, GatewayFailure>> {
    const timeoutMs = options.timeoutMs ?? this.settings.requestTimeoutMs;
    const baseMessages: ChatMessage[] = [
      { role: 'system', content: prompt.instructions },
      { role: 'user', content: prompt.content },
    ];
    const state: { correction: ChatMessage[] | null; rawOutput: string | null } = {
      correction: null,
      rawOutput: null,
    };

    const step = async (attempt: number): Promise<AttemptOutcome<Validated<T>, GatewayError>> => {
      const request: CompletionRequest = {
        messages: state.correction ? [...baseMessages, ...state.correction] : baseMessages,
        temperature: prompt.temperature,
        maxTokens: prompt.maxTokens,
        json: true,
        timeoutMs,
      };

      const call = await this.breaker.execute(() => this.complete(request, timeoutMs));
      if (!call.ok) {
        const error = call.error;
        if (isCircuitOpen(error)) {
          return { type: 'fail', error: new CircuitOpenError(error.message, error.retryInMs) };
        }
        const apiError = normalizeTransportError(error);
        if (apiError instanceof TransientAPIError) {
          return { type: 'retry', error: apiError, backoff: true };
        }
        return { type: 'fail', error: apiError };
      }

      const rawOutput = call.value;
      state.rawOutput = rawOutput;
      const parsed = parseModelOutput(rawOutput, prompt.outputSchema);
      if (parsed.ok) {
        return { type: 'success', value: { value: parsed.value, rawOutput } };
      }

      const validationError = new ValidationError(
        `Model output for ${prompt.kind} prompt failed validation`,
        rawOutput,
        parsed.error
      );
      if (state.correction) {
        return { type: 'fail', error: validationError };
      }

      logger.warn({ kind: prompt.kind, attempt, issues: parsed.error }, 'Model output invalid, re-prompting');
      state.correction = correctionMessages(prompt.schemaDescription, rawOutput, parsed.error);
      return { type: 'retry', error: validationError, backoff: false };
    };

    const result = await withRetry<Validated<T>, GatewayError>(
      step,
      {
        maxAttempts: this.settings.maxAttempts,
        initialDelayMs: this.settings.initialDelayMs,
        maxDelayMs: this.settings.maxDelayMs,
        multiplier: this.settings.multiplier,
        jitter: this.settings.jitter,
      },
      {
        signal: options.signal,
        abortError: () => new TransientAPIError('Cancelled before the model was called'),
        onRetry: (attempt, error, delayMs) => {
          logger.warn({ kind: prompt.kind, attempt, delayMs, error: error.message }, 'Retrying model call');
        },
      }
    );

    if (!result.ok) {
      const { error, attempts, reason } = result.error;
      logger.warn({ kind: prompt.kind, attempts, reason, error: error.kind }, 'Model call failed');
      return err({ error, attempts, reason, rawOutput: state.rawOutput });
    }

    const { value, attempts } = result.value;
    return ok({ value: value.value, rawOutput: value.rawOutput, attempts });
  }

  private async complete(request: CompletionRequest, timeoutMs: number): Promise<string> {
    try {
      return await withTimeout(
        (signal) => this.transport.complete({ ...request, signal }),
        timeoutMs,
        `${this.transport.name} completion`
      );
    } catch (e) {
      throw normalizeTransportError(e);
    }
  }
}
