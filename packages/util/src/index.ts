export * from './errors.js';
export * from './gate-error.js';
export * from './expirable-task.js';
export * from './injectable.js';
