/**
 * Lattice Syntax Types
 *
 * A formula over the two-element boolean lattice: variables, the two
 * bounds, and the join/meet connectives.
 */

export type LatticeNodeType =
    | 'var'
    | 'bound'
    | 'join'
    | 'meet';

export type Lattice<T> =
    | { readonly type: 'var'; readonly value: T }
    | { readonly type: 'bound'; readonly value: boolean }   // true = top, false = bottom
    | { readonly type: 'join'; readonly left: Lattice<T>; readonly right: Lattice<T> }
    | { readonly type: 'meet'; readonly left: Lattice<T>; readonly right: Lattice<T> };

/**
 * Term equality. The evaluator needs nothing else from a term type.
 */
export type Equality<T> = (a: T, b: T) => boolean;
