/**
 * Tests for structured error system
 */

import {
    InferenceError,
    InferenceException,
    getSuggestion,
    createParseError,
    createUnexpectedEndError,
    createInvalidCountError,
    createInvalidArgumentsError,
    createGenericError,
    serializeInferenceError,
} from '../src/types/errors.js';

describe('InferenceException', () => {
    test('creates exception with error object', () => {
        const error: InferenceError = {
            code: 'PARSE_ERROR',
            message: 'Unexpected word',
            span: { start: 5, end: 6, line: 1, col: 6 },
            suggestion: 'Check your statement',
            context: 'PIGS eat WINGS',
        };

        const exception = new InferenceException(error);

        expect(exception).toBeInstanceOf(Error);
        expect(exception.name).toBe('InferenceException');
        expect(exception.message).toBe('Unexpected word');
        expect(exception.error).toEqual(error);
    });

    test('toJSON returns error object', () => {
        const error: InferenceError = {
            code: 'UNKNOWN_TOOL',
            message: 'Unknown tool: prove',
        };

        expect(new InferenceException(error).toJSON()).toEqual(error);
    });
});

describe('getSuggestion', () => {
    test('suggests lowercase connectors', () => {
        expect(getSuggestion('PIGS Are BIRDS')).toBe(
            "Connector words are lowercase: 'with', 'and', 'that can', 'are', 'have', 'can'"
        );
    });

    test('suggests can after that', () => {
        expect(getSuggestion('PIGS that FLY have WINGS')).toBe(
            "'that' must be followed by 'can' (e.g. 'BIRDS that can FLY')"
        );
    });

    test('suggests completing a trailing joiner', () => {
        expect(getSuggestion('PIGS have WINGS and')).toBe('Statement ends with a joiner - add the missing label');
    });

    test('suggests adding a conclusion', () => {
        expect(getSuggestion('PIGS have')).toBe('Statement has no conclusion - add a label after the connector');
    });

    test('suggests a boundary word for a premise alone', () => {
        expect(getSuggestion('PIGS with WINGS')).toBe(
            "Separate premise and conclusion with 'are', 'have' or 'can'"
        );
    });

    test('returns undefined for a well-formed statement', () => {
        expect(getSuggestion('BIRDS that can FLY have WINGS')).toBeUndefined();
    });
});

describe('createParseError', () => {
    test('creates error with span info', () => {
        const exception = createParseError('Unexpected word', 'PIGS eat WINGS', 5);

        expect(exception.error.code).toBe('PARSE_ERROR');
        expect(exception.error.span).toEqual({ start: 5, end: 6, line: 1, col: 6 });
        expect(exception.error.context).toBe('PIGS eat WINGS');
    });

    test('omits span without a position', () => {
        const exception = createParseError('Bad statement', 'PIGS');
        expect(exception.error.span).toBeUndefined();
    });

    test('counts lines and columns in multi-line input', () => {
        const exception = createParseError('Bad', '1\nPIGS eat', 7);
        expect(exception.error.span).toEqual({ start: 7, end: 8, line: 2, col: 6 });
    });
});

describe('error factories', () => {
    test('unexpected end carries details', () => {
        const exception = createUnexpectedEndError('Ran out', 'PIGS', 4, { statement: 1 });

        expect(exception.error.code).toBe('UNEXPECTED_END');
        expect(exception.error.details).toEqual({ statement: 1 });
        expect(exception.error.span?.start).toBe(4);
    });

    test('invalid count names the bad line', () => {
        const exception = createInvalidCountError('many');

        expect(exception.error).toEqual({
            code: 'INVALID_COUNT',
            message: "Expected a statement count but got 'many'",
            suggestion: 'The first line must be a non-negative integer giving the number of statements',
            context: 'many',
            details: { line: 1 },
        });
    });

    test('invalid arguments lists issues', () => {
        const exception = createInvalidArgumentsError('Invalid tool arguments', ['statements: Required']);

        expect(exception.error.code).toBe('INVALID_ARGUMENTS');
        expect(exception.error.details).toEqual({ issues: ['statements: Required'] });
    });

    test('generic error keeps code and details', () => {
        const exception = createGenericError('UNKNOWN_TOOL', 'Unknown tool: x', { tool: 'x' });

        expect(exception.error).toEqual({
            code: 'UNKNOWN_TOOL',
            message: 'Unknown tool: x',
            details: { tool: 'x' },
        });
    });
});

describe('serializeInferenceError', () => {
    test('drops absent fields', () => {
        expect(serializeInferenceError({ code: 'PARSE_ERROR', message: 'Bad' })).toEqual({
            code: 'PARSE_ERROR',
            message: 'Bad',
        });
    });

    test('keeps present fields', () => {
        const error: InferenceError = {
            code: 'UNEXPECTED_END',
            message: 'Ran out',
            span: { start: 4, end: 5, line: 1, col: 5 },
            suggestion: 'Add more',
            context: 'PIGS',
            details: { statement: 1 },
        };

        expect(serializeInferenceError(error)).toEqual(error);
    });
});
