import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

const OPERATORS = new Map<string, TokenType>([
    ['AND', 'AND'], ['and', 'AND'],
    ['OR', 'OR'], ['or', 'OR'],
    ['WITH', 'WITH'], ['with', 'WITH'],
]);

/**
 * Tokenizer for license expressions
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            switch (char) {
                case '(': this.addToken('LPAREN', '('); this.pos++; continue;
                case ')': this.addToken('RPAREN', ')'); this.pos++; continue;
                case '+':
                    if (this.pos === 0 || /\s/.test(this.input[this.pos - 1])) {
                        throw createParseError("'+' must directly follow a license identifier", this.input, this.pos);
                    }
                    this.addToken('PLUS', '+'); this.pos++; continue;
            }

            // Identifiers and operator keywords
            if (/[A-Za-z0-9.\-:]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[A-Za-z0-9.\-:]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                const value = this.input.slice(start, this.pos);
                this.tokens.push({ type: OPERATORS.get(value) ?? 'IDENT', value, position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos });
    }
}
