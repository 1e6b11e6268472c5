/**
 * Lattice Predicates
 *
 * Equivalence, preorder and satisfiability, decided by exhausting the
 * evaluator's branches.
 */

import type { Equality, EvaluationOptions, Lattice } from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { both, evalLattice, runEval, strictEquality } from './evaluator.js';
import { freeVars, join } from './syntax.js';

/**
 * Test for equivalence: both formulas agree under every assignment.
 */
export function equivalent<T>(a: Lattice<T>, b: Lattice<T>, options: EvaluationOptions<T> = {}): boolean {
    const equals = options.equals ?? strictEquality;
    warnIfExpensive([a, b], equals, options);

    const pairs = runEval(both(evalLattice(a, equals), evalLattice(b, equals)));
    for (const [x, y] of pairs) {
        if (x !== y) return false;
    }
    return true;
}

/**
 * Test for preorder: `a ≤ b ⇔ a ∨ b ≡ b`.
 */
export function preorder<T>(a: Lattice<T>, b: Lattice<T>, options: EvaluationOptions<T> = {}): boolean {
    return equivalent(join(a, b), b, options);
}

/**
 * True if some assignment makes the formula evaluate to top.
 */
export function satisfiable<T>(a: Lattice<T>, options: EvaluationOptions<T> = {}): boolean {
    const equals = options.equals ?? strictEquality;
    warnIfExpensive([a], equals, options);

    for (const value of runEval(evalLattice(a, equals))) {
        if (value) return true;
    }
    return false;
}

/**
 * Distinct variables across formulas, in first-occurrence order.
 */
export function distinctVars<T>(formulas: readonly Lattice<T>[], equals: Equality<T> = strictEquality): T[] {
    const seen: T[] = [];
    for (const formula of formulas) {
        for (const v of freeVars(formula)) {
            if (!seen.some(s => equals(s, v))) {
                seen.push(v);
            }
        }
    }
    return seen;
}

function warnIfExpensive<T>(
    formulas: readonly Lattice<T>[],
    equals: Equality<T>,
    options: EvaluationOptions<T>
): void {
    const threshold = options.warnThreshold ?? DEFAULTS.variableWarningThreshold;
    const count = distinctVars(formulas, equals).length;
    if (count > threshold) {
        const warn = options.onWarning ?? console.warn;
        warn(`Lattice comparison over ${count} distinct variables (threshold ${threshold}); search is exponential in this count`);
    }
}
