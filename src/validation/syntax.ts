/**
 * Syntax Validator for trait statements
 *
 * Validates statements with the parser and adds lint warnings.
 */

import { parseStatement, isConnector } from '../parser/index.js';
import type { Statement } from '../types/parser.js';

export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export interface StatementResult extends ValidationResult {
    statement: string;
}

export interface ValidationReport {
    valid: boolean;
    statementResults: StatementResult[];
}

/**
 * Validate a single statement
 */
export function validateStatement(statement: string): ValidationResult {
    let parsed: Statement;
    try {
        parsed = parseStatement(statement);
    } catch (e) {
        return {
            valid: false,
            errors: [e instanceof Error ? e.message : String(e)],
            warnings: [],
        };
    }

    return {
        valid: true,
        errors: [],
        warnings: lint(statement, parsed),
    };
}

/**
 * Validate many statements and summarize
 */
export function validateStatements(statements: readonly string[]): ValidationReport {
    const statementResults = statements.map(statement => ({
        statement,
        ...validateStatement(statement),
    }));

    return {
        valid: statementResults.every(r => r.valid),
        statementResults,
    };
}

function lint(statement: string, parsed: Statement): string[] {
    const warnings: string[] = [];

    for (const label of [...parsed.from, ...parsed.to]) {
        if (isConnector(label)) {
            warnings.push(`Connector word '${label}' is used as a label`);
        }
    }

    const words = statement.trim().split(/\s+/);
    const seen = new Set<string>();
    const repeated = new Set<string>();
    for (const word of words) {
        if (isConnector(word)) continue;
        if (seen.has(word)) repeated.add(word);
        seen.add(word);
    }
    const conclusion = new Set(parsed.to);
    for (const label of repeated) {
        if (!(parsed.from.includes(label) && conclusion.has(label))) {
            warnings.push(`Label '${label}' is repeated`);
        }
    }

    for (const label of parsed.from) {
        if (conclusion.has(label)) {
            warnings.push(`Label '${label}' appears in both premise and conclusion`);
        }
    }

    return warnings;
}
