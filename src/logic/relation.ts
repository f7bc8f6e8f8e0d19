/**
 * Relation between a premise trait-set and a conclusion trait-set.
 *
 * "Objects with every label in `from` also have every label in `to`."
 * `from` is frozen at construction; `to` only ever grows.
 */

import type { RelationView } from '../types/responses.js';
import { DEFAULT_QUERY, TerminalQuery } from '../types/options.js';

export class Relation {
    readonly from: ReadonlySet<string>;
    private readonly conclusions: Set<string>;

    constructor(from: Iterable<string>, to: Iterable<string>) {
        this.from = new Set(from);
        this.conclusions = new Set(to);
    }

    /**
     * Current conclusion labels. Read-only view; grow it through `extend`.
     */
    get to(): ReadonlySet<string> {
        return this.conclusions;
    }

    /**
     * True iff `this.from ⊆ other.from`.
     */
    matches(other: Relation): boolean {
        return isSubset(this.from, other.from);
    }

    /**
     * True iff `other.from ⊆ this.to`: what this relation already concludes
     * satisfies everything `other` needs as a premise.
     */
    cascades(other: Relation): boolean {
        return isSubset(other.from, this.conclusions);
    }

    /**
     * Add every label of `source.to` to `this.to`.
     * @returns true if `this.to` actually grew
     */
    extend(source: Relation): boolean {
        const before = this.conclusions.size;
        for (const label of source.to) {
            this.conclusions.add(label);
        }
        return this.conclusions.size > before;
    }

    /**
     * Terminal predicate.
     *
     * Holds when the premise names the subject and the conclusion has the
     * ability. With `all` false it also holds when the conclusion has both the
     * subject and the ability, whatever the premise.
     */
    canFly(all: boolean, query: TerminalQuery = DEFAULT_QUERY): boolean {
        return (this.from.has(query.subject) && this.conclusions.has(query.ability))
            || (!all && this.conclusions.has(query.subject) && this.conclusions.has(query.ability));
    }

    clone(): Relation {
        return new Relation(this.from, this.conclusions);
    }

    toJSON(): RelationView {
        return { from: [...this.from], to: [...this.conclusions] };
    }

    toString(): string {
        return `${formatLabels(this.from)} -> ${formatLabels(this.conclusions)}`;
    }
}

export function isSubset(subset: ReadonlySet<string>, superset: ReadonlySet<string>): boolean {
    if (subset.size > superset.size) return false;
    for (const label of subset) {
        if (!superset.has(label)) return false;
    }
    return true;
}

export function formatLabels(labels: Iterable<string>): string {
    return `{${[...labels].join(', ')}}`;
}
