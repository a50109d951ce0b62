export * from './types.js';
export { build, buildNode, INDENT_WIDTH } from './builder.js';
