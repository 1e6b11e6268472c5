/**
 * License Lattice - Library Entry Point
 *
 * Lattice formulas with a brute-force equivalence/entailment checker,
 * and license expression satisfaction built on top of them.
 */

// Lattice syntax and evaluation
export * from './lattice/index.js';

// Parser
export { parseExpression, tryParseExpression, Tokenizer, Parser } from './parser/index.js';
export type { ParseResult } from './parser/index.js';

// License registry, translation and satisfaction
export * from './license/index.js';

// Types and Interfaces
export * from './types/index.js';
