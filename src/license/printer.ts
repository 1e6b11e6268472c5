import type { LicenseExpression } from '../types/index.js';
import { identityToString } from './terms.js';

/**
 * Print a license expression in canonical form.
 * Only disjunctions nested under a conjunction need parentheses.
 */
export function expressionToString(expr: LicenseExpression): string {
    switch (expr.type) {
        case 'license': {
            const id = identityToString(expr.license) + (expr.orLater ? '+' : '');
            return expr.exception !== undefined ? `${id} WITH ${expr.exception}` : id;
        }
        case 'and':
            return `${conjunct(expr.left)} AND ${conjunct(expr.right)}`;
        case 'or':
            return `${expressionToString(expr.left)} OR ${expressionToString(expr.right)}`;
    }
}

function conjunct(expr: LicenseExpression): string {
    const text = expressionToString(expr);
    return expr.type === 'or' ? `(${text})` : text;
}
