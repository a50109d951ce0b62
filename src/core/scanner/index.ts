export * from './types.js';
export { scan, normalizeSource, isWhitespace } from './scanner.js';
