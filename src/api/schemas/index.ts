export * from './common.js';
export * from './health.js';
export * from './rule.js';
export * from './query.js';
