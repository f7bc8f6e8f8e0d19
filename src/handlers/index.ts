export { evaluateHandler, evaluateTextHandler, checkWellFormedHandler } from './core.js';
