export * from './predicate.js';
export * from './gate-result.js';
