// Transport-level contract for the remote language model. Prompt content and
// output validation live in @inbox-triage/core; this layer only moves text.

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  // Ask the provider for a JSON object response
  json: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ModelTransport {
  readonly name: string;
  /**
   * Resolve with the raw completion text. Rejects with TransientAPIError or
   * PermanentAPIError only.
   */
  complete(request: CompletionRequest): Promise<string>;
}
