import type { Statement, Token } from '../types/parser.js';
import { createParseError, createUnexpectedEndError } from '../types/errors.js';
import { Tokenizer } from './tokenizer.js';

/**
 * Parser for trait statements
 *
 * Grammar (EBNF-ish):
 *   statement  = premise boundary conclusion
 *   premise    = label (joiner label)*
 *   conclusion = label (joiner label)*
 *   joiner     = 'with' | 'and' | 'that' 'can'
 *   boundary   = 'are' | 'have' | 'can'
 *   label      = any token
 *
 * Labels and connectors strictly alternate, so a connector word in a label
 * slot is taken as a label. A premise starting with `things` followed by a
 * connector uses `things` as a placeholder subject and contributes no label.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): Statement {
        if (this.current().type === 'EOF') {
            throw createUnexpectedEndError(
                'Empty statement: expected a premise label',
                this.originalInput,
                this.current().position
            );
        }

        const from = this.parsePremise();
        const to = this.parseConclusion();
        return { from: [...from], to: [...to] };
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private peek(offset: number = 0): Token {
        return this.tokens[this.pos + offset] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        if (token.type !== 'EOF') this.pos++;
        return token;
    }

    private parsePremise(): Set<string> {
        const labels = new Set<string>();
        const next = this.peek(1).type;
        let placeholder = this.current().value === 'things' && next !== 'WORD' && next !== 'EOF';

        for (;;) {
            const label = this.expectLabel('premise');
            if (!placeholder) labels.add(label.value);
            placeholder = false;

            const connector = this.advance();
            switch (connector.type) {
                case 'WITH':
                case 'AND':
                    continue;
                case 'THAT':
                    this.expectCan(connector);
                    continue;
                case 'ARE':
                case 'HAVE':
                case 'CAN':
                    return labels;
                case 'EOF':
                    throw createUnexpectedEndError(
                        "Expected 'are', 'have' or 'can' after the premise",
                        this.originalInput,
                        connector.position
                    );
                default:
                    throw createParseError(
                        `Unexpected word '${connector.value}': expected 'with', 'and', 'that can', 'are', 'have' or 'can'`,
                        this.originalInput,
                        connector.position
                    );
            }
        }
    }

    private parseConclusion(): Set<string> {
        const labels = new Set<string>();

        for (;;) {
            labels.add(this.expectLabel('conclusion').value);

            const connector = this.advance();
            switch (connector.type) {
                case 'WITH':
                case 'AND':
                    continue;
                case 'THAT':
                    this.expectCan(connector);
                    continue;
                case 'EOF':
                    return labels;
                case 'ARE':
                case 'HAVE':
                case 'CAN':
                    throw createParseError(
                        `Unexpected '${connector.value}' in the conclusion: a statement has exactly one 'are', 'have' or 'can'`,
                        this.originalInput,
                        connector.position
                    );
                default:
                    throw createParseError(
                        `Unexpected word '${connector.value}': expected 'with', 'and' or 'that can'`,
                        this.originalInput,
                        connector.position
                    );
            }
        }
    }

    private expectLabel(group: 'premise' | 'conclusion'): Token {
        const token = this.current();
        if (token.type === 'EOF') {
            throw createUnexpectedEndError(
                `Expected a label in the ${group}`,
                this.originalInput,
                token.position
            );
        }
        return this.advance();
    }

    private expectCan(that: Token): void {
        const token = this.current();
        if (token.type !== 'CAN') {
            throw createParseError(
                `Expected 'can' after 'that' but got ${token.type === 'EOF' ? 'end of statement' : `'${token.value}'`}`,
                this.originalInput,
                that.position
            );
        }
        this.advance();
    }
}

/**
 * Parse a single statement into its premise and conclusion labels
 */
export function parseStatement(input: string): Statement {
    const tokens = new Tokenizer(input).tokenize();
    return new Parser(tokens, input).parse();
}
