import type { Verbosity } from './responses.js';

/**
 * Subject/ability pair tested by the terminal predicate.
 */
export interface TerminalQuery {
    subject: string;
    ability: string;
}

export interface SaturationOptions {
    /** Record every successful merge and cascade as a trace line */
    includeTrace?: boolean;
    /**
     * Callback for progress updates, called once per completed cascade sweep.
     * @param progress Number of sweeps completed so far; increases with every call.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number, message: string) => void;
}

export interface EvaluateOptions extends SaturationOptions {
    query?: Partial<TerminalQuery>;
}

export const DEFAULT_QUERY: TerminalQuery = {
    subject: 'PIGS',
    ability: 'FLY',
};

const DEFAULT_VERBOSITY: Verbosity = 'standard';

export const DEFAULTS = {
    verbosity: DEFAULT_VERBOSITY,
    subject: DEFAULT_QUERY.subject,
    ability: DEFAULT_QUERY.ability,
} as const;

/**
 * Fill in missing query labels from the defaults.
 */
export function resolveQuery(query?: Partial<TerminalQuery>): TerminalQuery {
    return {
        subject: query?.subject ?? DEFAULT_QUERY.subject,
        ability: query?.ability ?? DEFAULT_QUERY.ability,
    };
}
