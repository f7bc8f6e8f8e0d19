/**
 * Fact Loader
 *
 * Turns counted statement text, or a list of statements, into relations.
 *
 *   2
 *   PIGS have WINGS
 *   things with WINGS can FLY
 */

import { Relation } from '../logic/relation.js';
import {
    InferenceException,
    createInvalidCountError,
    createUnexpectedEndError,
} from '../types/errors.js';
import { parseStatement } from './parser.js';

const COUNT_PATTERN = /^\d+$/;

/**
 * Split counted text into its statement lines.
 * Lines past the declared count are ignored.
 */
export function readStatements(input: string): string[] {
    const lines = input.split(/\r?\n/);
    const countLine = lines[0].trim();

    if (!COUNT_PATTERN.test(countLine)) {
        throw createInvalidCountError(countLine);
    }

    const count = Number.parseInt(countLine, 10);
    const statements = lines.slice(1, count + 1);

    if (statements.length < count) {
        throw createUnexpectedEndError(
            `Expected ${count} statements but found ${statements.length}`,
            input,
            input.length,
            { expected: count, found: statements.length }
        );
    }

    return statements;
}

/**
 * Parse each statement into a relation, in order.
 */
export function loadStatements(statements: readonly string[]): Relation[] {
    return statements.map((statement, index) => {
        try {
            const { from, to } = parseStatement(statement);
            return new Relation(from, to);
        } catch (e) {
            if (e instanceof InferenceException) {
                throw new InferenceException({
                    ...e.error,
                    details: { ...e.error.details, statement: index + 1 },
                });
            }
            throw e;
        }
    });
}

/**
 * Load relations from counted text.
 */
export function loadRelations(input: string): Relation[] {
    return loadStatements(readStatements(input));
}
