export * from './core-tokens.js';
export * from './provide-logger.js';
