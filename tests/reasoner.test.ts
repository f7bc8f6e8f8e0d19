/**
 * End-to-end tests: counted text in, verdict out
 */

import { Reasoner, createReasoner, formatVerdict } from '../src/reasoner.js';
import { loadStatements } from '../src/parser/index.js';
import { DEFAULT_QUERY } from '../src/types/options.js';
import { captureError, SCENARIOS } from './fixtures.js';

describe('Reasoner', () => {
    let reasoner: Reasoner;

    beforeEach(() => {
        reasoner = createReasoner();
    });

    describe('scenarios', () => {
        for (const [name, scenario] of Object.entries(SCENARIOS)) {
            test(`${name}: ${scenario.message}`, () => {
                const result = reasoner.evaluateText(scenario.input);
                expect(result.verdict).toBe(scenario.verdict);
                expect(result.message).toBe(scenario.message);
            });
        }
    });

    describe('evaluate', () => {
        test('cascade result carries statistics and saturated relations', () => {
            const result = reasoner.evaluateText(SCENARIOS.wingsCascade.input);

            expect(result.statistics).toEqual({
                timeMs: expect.any(Number),
                sweeps: 1,
                derivations: 1,
                relations: 2,
            });
            expect(result.relations).toEqual([
                { from: ['PIGS'], to: ['WINGS', 'FLY'] },
                { from: ['WINGS'], to: ['FLY'] },
            ]);
            expect(result.trace).toBeUndefined();
        });

        test('includes the trace when asked', () => {
            const result = reasoner.evaluateText(SCENARIOS.wingsCascade.input, { includeTrace: true });
            expect(result.trace).toEqual([
                'cascade: {PIGS} absorbs {FLY} via {WINGS}',
                'sweep 1: changed',
            ]);
        });

        test('derived loose conclusion gives some', () => {
            const result = reasoner.evaluateStatements([
                'BIRDS have WINGS',
                'things with WINGS are PIGS and FLY',
            ]);

            expect(result.verdict).toBe('some');
            expect(result.relations[0]).toEqual({ from: ['BIRDS'], to: ['WINGS', 'PIGS', 'FLY'] });
            expect(result.statistics.sweeps).toBe(2);
        });

        test('premise merge alone can give all', () => {
            const result = reasoner.evaluateStatements([
                'things with WINGS can FLY',
                'PIGS with WINGS have SNOUTS',
            ]);

            expect(result.message).toBe('All pigs can fly');
            expect(result.relations[1]).toEqual({ from: ['PIGS', 'WINGS'], to: ['SNOUTS', 'FLY'] });
        });

        test('zero statements give no', () => {
            const result = reasoner.evaluateText('0');
            expect(result.message).toBe('No pigs can fly');
            expect(result.statistics.relations).toBe(0);
        });

        test('does not mutate the relations passed in', () => {
            const relations = loadStatements(['PIGS have WINGS', 'things with WINGS can FLY']);

            reasoner.evaluate(relations);

            expect([...relations[0].to]).toEqual(['WINGS']);
        });

        test('custom query', () => {
            const result = reasoner.evaluateText('2\nCATS have WHISKERS\nthings with WHISKERS can SWIM', {
                query: { subject: 'CATS', ability: 'SWIM' },
            });
            expect(result.message).toBe('All cats can swim');
        });

        test('partial query falls back to the default subject', () => {
            const result = reasoner.evaluateText('1\nPIGS can SWIM', { query: { ability: 'SWIM' } });
            expect(result.message).toBe('All pigs can swim');
        });

        test('reports progress per sweep', () => {
            const onProgress = jest.fn();
            reasoner.evaluateText(SCENARIOS.unrelated.input, { onProgress });
            expect(onProgress).toHaveBeenCalledTimes(1);
            expect(onProgress).toHaveBeenCalledWith(1, 'Completed sweep 1');
        });

        test('malformed input aborts with no result', () => {
            const error = captureError(() => reasoner.evaluateText('1\nPIGS fly'));
            expect(error.error.code).toBe('PARSE_ERROR');
            expect(error.error.details).toEqual({ statement: 1 });
        });
    });
});

describe('formatVerdict', () => {
    test('renders each verdict for the default query', () => {
        expect(formatVerdict('all', DEFAULT_QUERY)).toBe('All pigs can fly');
        expect(formatVerdict('some', DEFAULT_QUERY)).toBe('Some pigs can fly');
        expect(formatVerdict('none', DEFAULT_QUERY)).toBe('No pigs can fly');
    });

    test('lowercases custom labels', () => {
        expect(formatVerdict('some', { subject: 'DUCKS', ability: 'QUACK' })).toBe('Some ducks can quack');
    });
});
