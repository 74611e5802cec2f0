export * from './logger.js';
export * from './log-level.js';
