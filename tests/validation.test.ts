/**
 * Tests for statement validation and lint warnings
 */

import { validateStatement, validateStatements } from '../src/validation/syntax.js';

describe('validateStatement', () => {
    test('well-formed statement has no errors or warnings', () => {
        expect(validateStatement('PIGS have WINGS')).toEqual({ valid: true, errors: [], warnings: [] });
    });

    test('reports the parser message for a malformed statement', () => {
        expect(validateStatement('PIGS that FLY')).toEqual({
            valid: false,
            errors: ["Expected 'can' after 'that' but got 'FLY'"],
            warnings: [],
        });
    });

    test('warns about a connector word used as a label', () => {
        expect(validateStatement('PIGS have with')).toEqual({
            valid: true,
            errors: [],
            warnings: ["Connector word 'with' is used as a label"],
        });
    });

    test('warns about a repeated label', () => {
        expect(validateStatement('PIGS with PIGS have WINGS').warnings).toEqual([
            "Label 'PIGS' is repeated",
        ]);
    });

    test('warns about a label on both sides', () => {
        expect(validateStatement('PIGS can PIGS').warnings).toEqual([
            "Label 'PIGS' appears in both premise and conclusion",
        ]);
    });
});

describe('validateStatements', () => {
    test('summarizes every statement', () => {
        const report = validateStatements(['PIGS have WINGS', 'WINGS']);

        expect(report.valid).toBe(false);
        expect(report.statementResults).toEqual([
            { statement: 'PIGS have WINGS', valid: true, errors: [], warnings: [] },
            {
                statement: 'WINGS',
                valid: false,
                errors: ["Expected 'are', 'have' or 'can' after the premise"],
                warnings: [],
            },
        ]);
    });

    test('empty list is valid', () => {
        expect(validateStatements([])).toEqual({ valid: true, statementResults: [] });
    });
});
