/**
 * License Expression Translation
 *
 * Maps a license expression onto a lattice formula over license terms:
 * AND becomes meet, OR becomes join, and `id+` becomes the join of
 * every later member of the license's family.
 */

import type { Lattice, Lic, LicenseExpression, TranslateOptions } from '../types/index.js';
import { DEFAULTS, createEmptyRangeError } from '../types/index.js';
import { BOTTOM, join, joinAll, meet, variable } from '../lattice/syntax.js';
import { defaultRegistry } from './registry.js';

export function exprToLattice(expr: LicenseExpression, options: TranslateOptions = {}): Lattice<Lic> {
    switch (expr.type) {
        case 'and':
            return meet(exprToLattice(expr.left, options), exprToLattice(expr.right, options));
        case 'or':
            return join(exprToLattice(expr.left, options), exprToLattice(expr.right, options));
        case 'license': {
            const { license, exception } = expr;
            // Later versions of a free-form reference are unknowable, so it stays one term
            if (!expr.orLater || license.kind === 'ref') {
                return variable<Lic>({ license, exception });
            }
            return expandRange(license.id, exception, options);
        }
    }
}

function expandRange(id: string, exception: string | undefined, options: TranslateOptions): Lattice<Lic> {
    const lookup = options.ranges ?? (options.registry ?? defaultRegistry).lookupLicenseRange;
    const members = lookup(id);

    if (members.length === 0) {
        if ((options.emptyRange ?? DEFAULTS.emptyRange) === 'error') {
            throw createEmptyRangeError(id);
        }
        const warn = options.onWarning ?? console.warn;
        warn(`License range for '${id}+' is empty; translating it as bottom`);
        return BOTTOM;
    }

    return joinAll(members.map(member => variable<Lic>({ license: { kind: 'id', id: member }, exception })));
}
