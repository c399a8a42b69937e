// Remote model transport contract
export type { ChatRole, ChatMessage, CompletionRequest, ModelTransport } from './types.js';

// API error taxonomy
export {
  type ApiError,
  type ApiErrorDetails,
  TriageError,
  TransientAPIError,
  PermanentAPIError,
  isTransientStatus,
} from './errors.js';

// Groq LLM integration
export * from './groq/index.js';
