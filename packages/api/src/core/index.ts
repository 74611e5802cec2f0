export * from './gate-options.js';
