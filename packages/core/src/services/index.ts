// Service interfaces
export * from './prompts.js';
export * from './gateway.js';
export * from './classifier.js';
export * from './responder.js';
export * from './planner.js';
export * from './ingestion.js';
export * from './pipeline.js';

// Service implementations
export * from './impl/index.js';
