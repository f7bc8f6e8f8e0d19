/**
 * Shared type definitions for trait inference
 */

// Re-export error types
export {
    InferenceException,
    createParseError,
    createUnexpectedEndError,
    createInvalidCountError,
    createInvalidArgumentsError,
    createGenericError,
    serializeInferenceError,
    getSuggestion,
} from './errors.js';

export type {
    InferenceErrorCode,
    ErrorSpan,
    InferenceError,
} from './errors.js';

// Re-export parser types
export type {
    TokenType,
    Token,
    Statement,
} from './parser.js';

// Re-export response types
export type {
    Verbosity,
    Verdict,
    RelationView,
    SaturationStatistics,
    SaturationResult,
    EvaluationResult,
    MinimalEvaluateResponse,
    StandardEvaluateResponse,
    DetailedEvaluateResponse,
    EvaluateResponse,
} from './responses.js';

// Re-export options
export {
    DEFAULTS,
    DEFAULT_QUERY,
    resolveQuery,
} from './options.js';

export type {
    TerminalQuery,
    SaturationOptions,
    EvaluateOptions,
} from './options.js';
