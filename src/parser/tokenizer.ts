import type { Token, TokenType } from '../types/parser.js';

const CONNECTORS: Record<string, TokenType> = {
    with: 'WITH',
    and: 'AND',
    that: 'THAT',
    can: 'CAN',
    are: 'ARE',
    have: 'HAVE',
};

/**
 * Tokenizer for trait statements
 *
 * Splits on whitespace. Connector words are recognized case-sensitively;
 * everything else is a WORD. Whether a connector actually acts as one is
 * decided by the parser from its position.
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const start = this.pos;
            while (this.pos < this.input.length && !/\s/.test(this.input[this.pos])) {
                this.pos++;
            }
            const value = this.input.slice(start, this.pos);
            const type = Object.prototype.hasOwnProperty.call(CONNECTORS, value) ? CONNECTORS[value] : 'WORD';
            this.tokens.push({ type, value, position: start });
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }
}

export function isConnector(value: string): boolean {
    return Object.prototype.hasOwnProperty.call(CONNECTORS, value);
}
