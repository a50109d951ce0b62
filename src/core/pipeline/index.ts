export * from './types.js';
export { format, formatWithChanges, formatOrThrow, check } from './pipeline.js';
