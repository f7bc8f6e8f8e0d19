/**
 * Parser Types
 */

export type TokenType =
    | 'WORD'          // PIGS, WINGS, any label
    | 'WITH'          // with
    | 'AND'           // and
    | 'THAT'          // that (only valid before 'can')
    | 'CAN'           // can
    | 'ARE'           // are
    | 'HAVE'          // have
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}

/**
 * A parsed statement: premise labels and conclusion labels, deduplicated,
 * in the order they first appear.
 */
export interface Statement {
    from: string[];
    to: string[];
}
