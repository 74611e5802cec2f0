export * from './byte-size.js';
export * from './timezone-offset.js';
export * from './socket-address.js';
export * from './predicate-factory.js';
export * from './predicate-validator.js';
export * from './predicate-evaluator.js';
