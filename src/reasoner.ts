/**
 * Reasoner: loads relations, saturates them and picks a verdict.
 *
 * The verdict is the strongest claim that holds:
 *   all  - some relation has the subject as premise and the ability as conclusion
 *   some - some relation concludes both the subject and the ability
 *   none - neither, once the relations are saturated
 */

import { Relation } from './logic/relation.js';
import { SaturationEngine, anyCanFly } from './engines/saturation.js';
import { loadRelations, loadStatements } from './parser/index.js';
import { EvaluateOptions, TerminalQuery, resolveQuery } from './types/options.js';
import type { EvaluationResult, Verdict } from './types/responses.js';

const VERDICT_PREFIX: Record<Verdict, string> = {
    all: 'All',
    some: 'Some',
    none: 'No',
};

/**
 * Render the verdict line, e.g. "All pigs can fly".
 */
export function formatVerdict(verdict: Verdict, query: TerminalQuery): string {
    return `${VERDICT_PREFIX[verdict]} ${query.subject.toLowerCase()} can ${query.ability.toLowerCase()}`;
}

export class Reasoner {
    /**
     * Evaluate already-loaded relations. The relations passed in are cloned
     * and never mutated.
     */
    evaluate(relations: readonly Relation[], options: EvaluateOptions = {}): EvaluationResult {
        const startTime = Date.now();
        const query = resolveQuery(options.query);
        const working = relations.map(relation => relation.clone());

        const engine = new SaturationEngine({
            includeTrace: options.includeTrace,
            onProgress: options.onProgress,
        });
        const run = engine.saturate(working, true, query);

        // Without a strict hit the relations are at their fixpoint, so the
        // looser check needs no second saturation.
        let verdict: Verdict = 'none';
        if (run.satisfied) {
            verdict = 'all';
        } else if (anyCanFly(working, false, query)) {
            verdict = 'some';
        }

        return {
            verdict,
            message: formatVerdict(verdict, query),
            statistics: {
                timeMs: Date.now() - startTime,
                sweeps: run.sweeps,
                derivations: run.derivations,
                relations: working.length,
            },
            relations: working.map(relation => relation.toJSON()),
            ...(run.trace && { trace: run.trace }),
        };
    }

    /**
     * Evaluate counted statement text (count line, then that many statements).
     */
    evaluateText(input: string, options?: EvaluateOptions): EvaluationResult {
        return this.evaluate(loadRelations(input), options);
    }

    /**
     * Evaluate a list of statements.
     */
    evaluateStatements(statements: readonly string[], options?: EvaluateOptions): EvaluationResult {
        return this.evaluate(loadStatements(statements), options);
    }
}

export function createReasoner(): Reasoner {
    return new Reasoner();
}
