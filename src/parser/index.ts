export { Tokenizer, isConnector } from './tokenizer.js';
export { Parser, parseStatement } from './parser.js';
export { readStatements, loadStatements, loadRelations } from './loader.js';
