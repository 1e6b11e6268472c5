import type { LicenseExpression, ParseOptions } from '../types/index.js';
import { LicenseException } from '../types/index.js';
import { defaultRegistry } from '../license/registry.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

export type ParseResult =
    | { ok: true; expression: LicenseExpression }
    | { ok: false; error: LicenseException };

/**
 * Parse a license expression string into an AST
 */
export function parseExpression(input: string, options: ParseOptions = {}): LicenseExpression {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input, options.registry ?? defaultRegistry);
    return parser.parse();
}

/**
 * Like parseExpression, but returns license errors instead of throwing them
 */
export function tryParseExpression(input: string, options: ParseOptions = {}): ParseResult {
    try {
        return { ok: true, expression: parseExpression(input, options) };
    } catch (e) {
        if (e instanceof LicenseException) {
            return { ok: false, error: e };
        }
        throw e;
    }
}
