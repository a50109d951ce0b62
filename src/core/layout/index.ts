export { render, MAX_WIDTH } from './renderer.js';
