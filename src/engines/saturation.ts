/**
 * Saturation Engine
 *
 * Forward-chains conclusion sets across a relation collection:
 *
 *   Phase 1 (once):      a.from ⊆ b.from  =>  b.to ∪= a.to
 *   Phase 2 (fixpoint):  b.from ⊆ a.to    =>  a.to ∪= b.to
 *
 * Phase 2 sweeps every ordered pair until a sweep changes nothing, testing the
 * terminal predicate after each completed sweep. Relations are mutated in
 * place; self-pairs are never considered.
 */

import { Relation, formatLabels } from '../logic/relation.js';
import { DEFAULT_QUERY, SaturationOptions, TerminalQuery } from '../types/options.js';
import type { SaturationResult } from '../types/responses.js';

export class SaturationEngine {
    private sweeps = 0;
    private derivations = 0;
    private trace: string[] | undefined;

    constructor(private readonly options: SaturationOptions = {}) {
        this.reset();
    }

    /**
     * Run both phases and report whether `canFly(all)` holds for any relation.
     */
    saturate(
        relations: readonly Relation[],
        all: boolean,
        query: TerminalQuery = DEFAULT_QUERY
    ): SaturationResult {
        this.reset();
        this.mergePremises(relations);

        let changed = true;
        while (changed) {
            changed = this.cascadeSweep(relations);
            this.sweeps++;
            this.trace?.push(`sweep ${this.sweeps}: ${changed ? 'changed' : 'no change'}`);
            this.options.onProgress?.(this.sweeps, `Completed sweep ${this.sweeps}`);

            if (anyCanFly(relations, all, query)) {
                return this.result(true);
            }
        }

        return this.result(false);
    }

    /**
     * Phase 1: every relation inherits the conclusions of each relation whose
     * premise is a subset of its own. A single pass in collection order.
     * @returns true if any conclusion set grew
     */
    mergePremises(relations: readonly Relation[]): boolean {
        let changed = false;
        for (const a of relations) {
            for (const b of relations) {
                if (a === b) continue;

                if (a.matches(b) && b.extend(a)) {
                    this.record(`merge: ${formatLabels(b.from)} inherits ${formatLabels(a.to)} from ${formatLabels(a.from)}`);
                    changed = true;
                }
            }
        }
        return changed;
    }

    /**
     * Phase 2, one sweep: a relation whose conclusions cover another's premise
     * absorbs that relation's conclusions.
     * @returns true if any conclusion set grew
     */
    cascadeSweep(relations: readonly Relation[]): boolean {
        let changed = false;
        for (const a of relations) {
            for (const b of relations) {
                if (a === b) continue;

                if (a.cascades(b) && a.extend(b)) {
                    this.record(`cascade: ${formatLabels(a.from)} absorbs ${formatLabels(b.to)} via ${formatLabels(b.from)}`);
                    changed = true;
                }
            }
        }
        return changed;
    }

    private reset(): void {
        this.sweeps = 0;
        this.derivations = 0;
        this.trace = this.options.includeTrace ? [] : undefined;
    }

    private record(line: string): void {
        this.derivations++;
        this.trace?.push(line);
    }

    private result(satisfied: boolean): SaturationResult {
        return {
            satisfied,
            sweeps: this.sweeps,
            derivations: this.derivations,
            ...(this.trace && { trace: this.trace }),
        };
    }
}

/**
 * Evaluate the terminal predicate over the whole collection.
 */
export function anyCanFly(
    relations: readonly Relation[],
    all: boolean,
    query: TerminalQuery = DEFAULT_QUERY
): boolean {
    return relations.some(relation => relation.canFly(all, query));
}

/**
 * Saturate a copy of `relations` and test `canFly(all)`.
 * The caller's relations are left untouched.
 */
export function canFly(
    relations: readonly Relation[],
    all: boolean,
    query: TerminalQuery = DEFAULT_QUERY
): boolean {
    const copies = relations.map(relation => relation.clone());
    return new SaturationEngine().saturate(copies, all, query).satisfied;
}

export function createSaturationEngine(options?: SaturationOptions): SaturationEngine {
    return new SaturationEngine(options);
}
