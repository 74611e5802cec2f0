export * from './condition-gate.js';
export * from './config/index.js';
export * from './environment/index.js';
export * from './errors.js';
export * from './locking/index.js';
export * from './predicates/index.js';
export * from './probes/index.js';
export * from './registry/index.js';
export * from './reporters/index.js';
export * from './runner/index.js';
export { LogConfigurator } from './logging/index.js';
export { Timer } from './utils/timer.js';
