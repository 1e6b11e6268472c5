import type { LicenseExpression, SatisfiesOptions } from '../types/index.js';
import { preorder } from '../lattice/predicates.js';
import { parseExpression } from '../parser/index.js';
import { exprToLattice } from './translate.js';
import { licEquals } from './terms.js';

export type ExpressionInput = LicenseExpression | string;

/**
 * Does a package licensed under `pkg` satisfy the license `policy`?
 *
 * `satisfies(a, b) ⇔ ⟦b⟧ ≤ ⟦a⟧`
 *
 * @example
 * satisfies('MIT OR GPL-2.0', 'ISC AND MIT')      // true
 * satisfies('GPL-3.0', 'ISC AND MIT')             // false
 */
export function satisfies(pkg: ExpressionInput, policy: ExpressionInput, options: SatisfiesOptions = {}): boolean {
    const packageLattice = exprToLattice(toExpression(pkg, options), options);
    const policyLattice = exprToLattice(toExpression(policy, options), options);
    return preorder(policyLattice, packageLattice, {
        equals: licEquals,
        warnThreshold: options.warnThreshold,
        onWarning: options.onWarning,
    });
}

export function toExpression(input: ExpressionInput, options: SatisfiesOptions = {}): LicenseExpression {
    return typeof input === 'string' ? parseExpression(input, { registry: options.registry }) : input;
}
