import type { Lattice } from '../types/index.js';

/**
 * Pretty-print a lattice formula
 */
export function latticeToString<T>(node: Lattice<T>, show: (value: T) => string = String): string {
    switch (node.type) {
        case 'var':
            return show(node.value);
        case 'bound':
            return node.value ? '⊤' : '⊥';
        case 'join':
            return `(${latticeToString(node.left, show)} ∨ ${latticeToString(node.right, show)})`;
        case 'meet':
            return `(${latticeToString(node.left, show)} ∧ ${latticeToString(node.right, show)})`;
    }
}
