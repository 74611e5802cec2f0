export * from './outcome.js';
export * from './entry-state.js';
export * from './test-entry.js';
export * from './mock-environment.js';
export * from './partial-setup-error.js';
export * from './run-summary.js';
export * from './reporter.js';
