export * from './probes.js';
export * from './node-probes.js';
