/**
 * Structured Error System for trait inference
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for loading and evaluation
 */
export type InferenceErrorCode =
  | 'PARSE_ERROR'        // Bad grammar in a statement
  | 'INVALID_COUNT'      // Statement count is not a non-negative integer
  | 'UNEXPECTED_END'     // Ran out of tokens or lines
  | 'INVALID_ARGUMENTS'  // Tool arguments failed schema validation
  | 'UNKNOWN_TOOL';      // Tool name not registered

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface InferenceError {
  code: InferenceErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending statement or line
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping InferenceError for throw/catch patterns
 */
export class InferenceException extends Error {
  public readonly error: InferenceError;

  constructor(error: InferenceError) {
    super(error.message);
    this.name = 'InferenceException';
    this.error = error;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InferenceException);
    }
  }

  toJSON(): InferenceError {
    return this.error;
  }
}

/**
 * Common statement mistakes and their suggestions
 */
const STATEMENT_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\b(With|And|That|Can|Are|Have)\b/,
      suggestion: "Connector words are lowercase: 'with', 'and', 'that can', 'are', 'have', 'can'"
    },
    {
      pattern: /\bthat\s+(?!can\b)\S+/,
      suggestion: "'that' must be followed by 'can' (e.g. 'BIRDS that can FLY')"
    },
    {
      pattern: /\b(with|and|that)\s*$/,
      suggestion: "Statement ends with a joiner - add the missing label"
    },
    {
      pattern: /\b(are|have|can)\s*$/,
      suggestion: "Statement has no conclusion - add a label after the connector"
    },
    {
      pattern: /^\s*\S+(\s+(with|and|that\s+can)\s+\S+)*\s*$/,
      suggestion: "Separate premise and conclusion with 'are', 'have' or 'can'"
    },
  ];

/**
 * Get a suggestion for a malformed statement based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of STATEMENT_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

function spanAt(input: string, position: number, length: number = 1): ErrorSpan {
  return {
    start: position,
    end: position + Math.max(length, 1),
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  };
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number,
  details?: Record<string, unknown>
): InferenceException {
  return new InferenceException({
    code: 'PARSE_ERROR',
    message,
    span: position !== undefined ? spanAt(input, position) : undefined,
    suggestion: getSuggestion(input),
    context: input,
    details,
  });
}

/**
 * Create an error for running out of tokens or statement lines
 */
export function createUnexpectedEndError(
  message: string,
  input: string,
  position?: number,
  details?: Record<string, unknown>
): InferenceException {
  return new InferenceException({
    code: 'UNEXPECTED_END',
    message,
    span: position !== undefined ? spanAt(input, position) : undefined,
    suggestion: getSuggestion(input),
    context: input,
    details,
  });
}

/**
 * Create an error for a statement count line that is not a count
 */
export function createInvalidCountError(raw: string): InferenceException {
  return new InferenceException({
    code: 'INVALID_COUNT',
    message: `Expected a statement count but got '${raw}'`,
    suggestion: 'The first line must be a non-negative integer giving the number of statements',
    context: raw,
    details: { line: 1 },
  });
}

/**
 * Create an error for tool arguments that fail validation
 */
export function createInvalidArgumentsError(
  message: string,
  issues: string[]
): InferenceException {
  return new InferenceException({
    code: 'INVALID_ARGUMENTS',
    message,
    details: { issues },
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize an InferenceError for JSON output
 */
export function serializeInferenceError(error: InferenceError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Create a generic inference error exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: InferenceErrorCode,
  message: string,
  details?: Record<string, unknown>
): InferenceException {
  return new InferenceException({
    code,
    message,
    details,
  });
}
