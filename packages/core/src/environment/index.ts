export * from './mock-environment-group.js';
