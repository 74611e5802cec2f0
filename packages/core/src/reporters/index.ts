export * from './result-aggregator.js';
export * from './writer.js';
export * from './clear-text-reporter.js';
export * from './json-reporter.js';
export * from './broadcast-reporter.js';
