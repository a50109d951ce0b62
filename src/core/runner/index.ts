export * from './types.js';
export * from './runner.js';
