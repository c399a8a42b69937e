export {
  type CompletionCall,
  type GroqTransportOptions,
  GroqTransport,
  createGroqTransport,
  createGroqCompletionCall,
  mapGroqError,
} from './client.js';
