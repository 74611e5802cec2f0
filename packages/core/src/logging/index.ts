export * from './log-configurator.js';
