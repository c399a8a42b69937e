// Types
export * from './types/email.js';
export * from './types/taxonomy.js';
export * from './types/classification.js';
export * from './types/response.js';
export * from './types/run.js';

// Errors
export * from './errors.js';

// Services
export * from './services/index.js';

// Wiring
export * from './factory.js';
