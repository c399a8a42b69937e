import Groq from 'groq-sdk';
import { createLogger, toError } from '@inbox-triage/utils';
import { getEnv, type Env } from '@inbox-triage/config';
import type { ChatMessage, CompletionRequest, ModelTransport } from '../types.js';
import { TransientAPIError, PermanentAPIError, isTransientStatus, type ApiError } from '../errors.js';

const logger = createLogger({ service: 'groq-transport' });

type CreateParams = Parameters<Groq['chat']['completions']['create']>[0];
type GroqMessage = CreateParams['messages'][number];

/**
 * One chat completion call; resolves with the message text, or null when the
 * provider returned no content.
 */
export type CompletionCall = (request: CompletionRequest, model: string) => Promise<string | null>;

export interface GroqTransportOptions {
  apiKey: string;
  // Using llama-3.3-70b-versatile for best quality, or llama-3.1-8b-instant for speed
  model: string;
}

function toGroqMessage(message: ChatMessage): GroqMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Maps SDK failures onto the transient / permanent split the gateway retries on.
 */
export function mapGroqError(error: unknown): ApiError {
  if (error instanceof TransientAPIError || error instanceof PermanentAPIError) {
    return error;
  }
  if (error instanceof Groq.APIUserAbortError) {
    return new TransientAPIError('Request aborted before completion', { cause: error });
  }
  if (error instanceof Groq.APIConnectionError) {
    return new TransientAPIError(`Connection failure: ${error.message}`, { cause: error });
  }
  if (error instanceof Groq.APIError) {
    const status = error.status;
    if (status === undefined || isTransientStatus(status)) {
      return new TransientAPIError(error.message, { status, cause: error });
    }
    return new PermanentAPIError(error.message, { status, cause: error });
  }
  return new TransientAPIError(toError(error).message, { cause: error });
}

export function createGroqCompletionCall(client: Groq): CompletionCall {
  return async (request, model) => {
    const response = await client.chat.completions.create(
      {
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: request.messages.map(toGroqMessage),
        ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
      },
      {
        signal: request.signal,
        timeout: request.timeoutMs,
      }
    );
    return response.choices[0]?.message?.content ?? null;
  };
}

export class GroqTransport implements ModelTransport {
  readonly name = 'groq';
  private readonly call: CompletionCall;
  private readonly model: string;

  constructor(options: GroqTransportOptions, call?: CompletionCall) {
    this.model = options.model;
    // Retries belong to the model gateway, so the SDK must not retry on its own
    this.call = call ?? createGroqCompletionCall(new Groq({ apiKey: options.apiKey, maxRetries: 0 }));
  }

  async complete(request: CompletionRequest): Promise<string> {
    let content: string | null;
    try {
      content = await this.call(request, this.model);
    } catch (error) {
      const mapped = mapGroqError(error);
      logger.debug({ kind: mapped.kind, status: mapped.status, model: this.model }, 'Groq request failed');
      throw mapped;
    }

    // The service answered; an empty answer is a format problem for the caller
    if (!content) {
      logger.debug({ model: this.model }, 'Groq returned no content');
      return '';
    }
    return content;
  }
}

export function createGroqTransport(env: Env = getEnv()): GroqTransport {
  if (!env.GROQ_API_KEY) {
    throw new Error('GROQ_API_KEY must be set to use the Groq transport');
  }
  return new GroqTransport({ apiKey: env.GROQ_API_KEY, model: env.GROQ_MODEL });
}
