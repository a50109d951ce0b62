export * from './types.js';
export { parse } from './parser.js';
