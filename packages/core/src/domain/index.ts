export * from './run-config.js';
export * from './iteration.js';
