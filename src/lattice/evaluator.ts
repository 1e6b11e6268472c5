/**
 * Brute-Force Lattice Evaluator
 *
 * Nondeterministic evaluation as a search over boolean assignments.
 * An `Eval` takes the assignment built so far on the current path and
 * yields one `[assignment, result]` pair per branch it forks into.
 * Assignments are persistent lists: forking extends a shared tail and
 * never mutates it, so sibling branches cannot observe each other.
 *
 * Building and running an `Eval` recurses once per formula level, so
 * formulas nested thousands of connectives deep exhaust the call stack.
 * The search is exponential well before that for any real input.
 */

import type { Equality, Lattice } from '../types/index.js';

export type Assignment<T> =
    | { readonly term: T; readonly value: boolean; readonly next: Assignment<T> }
    | null;

export type Branch<T, A> = readonly [Assignment<T>, A];

export type Eval<T, A> = (state: Assignment<T>) => Iterable<Branch<T, A>>;

export const strictEquality = <T>(a: T, b: T): boolean => a === b;

export function lookup<T>(state: Assignment<T>, term: T, equals: Equality<T>): boolean | undefined {
    for (let node = state; node !== null; node = node.next) {
        if (equals(node.term, term)) {
            return node.value;
        }
    }
    return undefined;
}

export function assign<T>(state: Assignment<T>, term: T, value: boolean): Assignment<T> {
    return { term, value, next: state };
}

export function pure<T, A>(value: A): Eval<T, A> {
    return function* (state) {
        yield [state, value];
    };
}

export function bind<T, A, B>(m: Eval<T, A>, f: (value: A) => Eval<T, B>): Eval<T, B> {
    return function* (state) {
        for (const [next, value] of m(state)) {
            yield* f(value)(next);
        }
    };
}

/**
 * Reuse the term's value on this path, or fork on it (true first).
 */
export function guess<T>(term: T, equals: Equality<T>): Eval<T, boolean> {
    return function* (state) {
        const known = lookup(state, term, equals);
        if (known !== undefined) {
            yield [state, known];
            return;
        }
        yield [assign(state, term, true), true];
        yield [assign(state, term, false), false];
    };
}

/**
 * Lazy `||`: `b` only runs on paths where `a` yields false.
 */
export function orElse<T>(a: Eval<T, boolean>, b: Eval<T, boolean>): Eval<T, boolean> {
    return bind(a, value => value ? pure<T, boolean>(true) : b);
}

/**
 * Lazy `&&`: `b` only runs on paths where `a` yields true.
 */
export function andAlso<T>(a: Eval<T, boolean>, b: Eval<T, boolean>): Eval<T, boolean> {
    return bind(a, value => value ? b : pure<T, boolean>(false));
}

/**
 * Run two computations on the same path.
 */
export function both<T, A, B>(a: Eval<T, A>, b: Eval<T, B>): Eval<T, readonly [A, B]> {
    return bind(a, x => bind(b, y => pure<T, readonly [A, B]>([x, y])));
}

export function evalLattice<T>(node: Lattice<T>, equals: Equality<T> = strictEquality): Eval<T, boolean> {
    switch (node.type) {
        case 'var':
            return guess(node.value, equals);
        case 'bound':
            return pure<T, boolean>(node.value);
        case 'join':
            return orElse(evalLattice(node.left, equals), evalLattice(node.right, equals));
        case 'meet':
            return andAlso(evalLattice(node.left, equals), evalLattice(node.right, equals));
    }
}

/**
 * Results of every complete branch, starting from the empty assignment.
 */
export function* runEval<T, A>(m: Eval<T, A>): Generator<A> {
    for (const [, value] of m(null)) {
        yield value;
    }
}
