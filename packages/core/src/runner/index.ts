export * from './deadline.js';
export * from './entry-run.js';
export * from './entry-executor.js';
export * from './body-executor.js';
export * from './gate-decorator.js';
export * from './lock-decorator.js';
export * from './environment-decorator.js';
export * from './deadline-decorator.js';
export * from './gate-test-runner.js';
