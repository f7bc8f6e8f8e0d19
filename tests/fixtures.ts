/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { Relation } from '../src/logic/relation.js';
import { InferenceException } from '../src/types/errors.js';
import type { Verdict } from '../src/types/responses.js';

// === Counted-text scenarios ===
export const SCENARIOS: Record<string, { input: string; verdict: Verdict; message: string }> = {
    wingsCascade: {
        input: '2\nPIGS have WINGS\nthings with WINGS can FLY',
        verdict: 'all',
        message: 'All pigs can fly',
    },
    unrelated: {
        input: '1\nCATS have CLAWS',
        verdict: 'none',
        message: 'No pigs can fly',
    },
    looseOnly: {
        input: '1\nthings with HOOVES are PIGS with FLY',
        verdict: 'some',
        message: 'Some pigs can fly',
    },
};

export function relation(from: string[], to: string[]): Relation {
    return new Relation(from, to);
}

/**
 * Run `fn` and return the InferenceException it throws.
 */
export function captureError(fn: () => unknown): InferenceException {
    try {
        fn();
    } catch (e) {
        if (e instanceof InferenceException) return e;
        throw e;
    }
    throw new Error('Expected an InferenceException to be thrown');
}
