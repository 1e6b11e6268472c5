/**
 * Lattice Syntax
 *
 * Constructors and structural operations over lattice formulas.
 */

import type { Lattice } from '../types/index.js';

export const TOP: Lattice<never> = { type: 'bound', value: true };
export const BOTTOM: Lattice<never> = { type: 'bound', value: false };

export function variable<T>(value: T): Lattice<T> {
    return { type: 'var', value };
}

export function bound<T = never>(value: boolean): Lattice<T> {
    return value ? TOP : BOTTOM;
}

export function join<T>(left: Lattice<T>, right: Lattice<T>): Lattice<T> {
    return { type: 'join', left, right };
}

export function meet<T>(left: Lattice<T>, right: Lattice<T>): Lattice<T> {
    return { type: 'meet', left, right };
}

/**
 * Left fold with join. The empty join is bottom.
 */
export function joinAll<T>(items: readonly Lattice<T>[]): Lattice<T> {
    if (items.length === 0) return BOTTOM;
    return items.slice(1).reduce<Lattice<T>>((acc, item) => join(acc, item), items[0]);
}

/**
 * Left fold with meet. The empty meet is top.
 */
export function meetAll<T>(items: readonly Lattice<T>[]): Lattice<T> {
    if (items.length === 0) return TOP;
    return items.slice(1).reduce<Lattice<T>>((acc, item) => meet(acc, item), items[0]);
}

/**
 * De Morgan dual: swaps join and meet, negates bounds.
 */
export function dual<T>(node: Lattice<T>): Lattice<T> {
    switch (node.type) {
        case 'var':
            return node;
        case 'bound':
            return bound(!node.value);
        case 'join':
            return meet(dual(node.left), dual(node.right));
        case 'meet':
            return join(dual(node.left), dual(node.right));
    }
}

/**
 * Every variable occurrence, left to right. Duplicates are kept.
 */
export function freeVars<T>(node: Lattice<T>): T[] {
    const vars: T[] = [];
    const stack: Lattice<T>[] = [node];
    // Explicit stack: translated expressions can nest far deeper than the call stack
    while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined) break;
        switch (current.type) {
            case 'var':
                vars.push(current.value);
                break;
            case 'bound':
                break;
            case 'join':
            case 'meet':
                stack.push(current.right, current.left);
                break;
        }
    }
    return vars;
}

/**
 * Replace every variable with the formula `f` returns for it.
 */
export function substitute<T, U>(node: Lattice<T>, f: (value: T) => Lattice<U>): Lattice<U> {
    switch (node.type) {
        case 'var':
            return f(node.value);
        case 'bound':
            return bound(node.value);
        case 'join':
            return join(substitute(node.left, f), substitute(node.right, f));
        case 'meet':
            return meet(substitute(node.left, f), substitute(node.right, f));
    }
}

export function mapLattice<T, U>(node: Lattice<T>, f: (value: T) => U): Lattice<U> {
    return substitute(node, value => variable(f(value)));
}
