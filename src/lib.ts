/**
 * Trait Inference - Library Entry Point
 *
 * Exports the core functionality for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Core
export { Relation, isSubset, formatLabels } from './logic/relation.js';
export {
    SaturationEngine,
    createSaturationEngine,
    anyCanFly,
    canFly,
} from './engines/saturation.js';
export { Reasoner, createReasoner, formatVerdict } from './reasoner.js';

// Loader
export {
    Tokenizer,
    Parser,
    parseStatement,
    readStatements,
    loadStatements,
    loadRelations,
} from './parser/index.js';

// Validation
export { validateStatement, validateStatements } from './validation/syntax.js';
export type { ValidationResult, StatementResult, ValidationReport } from './validation/syntax.js';

// Responses
export { buildEvaluateResponse } from './utils/response.js';

// Types and Interfaces
export * from './types/index.js';
