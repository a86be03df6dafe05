// Types
export * from './types/index.js';

// Core components
export * from './core/index.js';

// Evaluation
export * from './evaluation/index.js';

// Tracing
export * from './debugging/index.js';

// Utils
export * from './utils/index.js';

// Validation
export * from './validation/index.js';
