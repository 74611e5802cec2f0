export * from './options-loader.js';
