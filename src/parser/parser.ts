import type { LicenseExpression, LicenseIdentity } from '../types/index.js';
import type { Token, TokenType } from '../types/parser.js';
import {
    createParseError,
    createUnknownExceptionError,
    createUnknownLicenseError,
} from '../types/errors.js';
import type { LicenseRegistry } from '../license/registry.js';

const LICENSE_REF = /^(?:DocumentRef-([A-Za-z0-9.\-]+):)?LicenseRef-([A-Za-z0-9.\-]+)$/;

/**
 * Parser for license expressions
 *
 * Grammar (EBNF-ish):
 *   expression  = disjunction
 *   disjunction = conjunction (('OR' conjunction)*)
 *   conjunction = with (('AND' with)*)
 *   with        = '(' expression ')' | license ('WITH' IDENT)?
 *   license     = IDENT '+'?
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private registry: LicenseRegistry;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string, registry: LicenseRegistry) {
        this.tokens = tokens;
        this.originalInput = originalInput;
        this.registry = registry;
    }

    parse(): LicenseExpression {
        if (this.current().type === 'EOF') {
            throw createParseError('Empty license expression', this.originalInput, this.current().position);
        }
        const result = this.parseExpression();
        if (this.current().type !== 'EOF') {
            throw createParseError(
                `Unexpected token '${this.current().value}'`,
                this.originalInput,
                this.current().position
            );
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw createParseError(
                `Expected ${type} but got ${this.current().type}`,
                this.originalInput,
                this.current().position
            );
        }
        return this.advance();
    }

    private parseExpression(): LicenseExpression {
        return this.parseDisjunction();
    }

    private parseDisjunction(): LicenseExpression {
        let left = this.parseConjunction();

        while (this.current().type === 'OR') {
            this.advance();
            const right = this.parseConjunction();
            left = { type: 'or', left, right };
        }

        return left;
    }

    private parseConjunction(): LicenseExpression {
        let left = this.parseWith();

        while (this.current().type === 'AND') {
            this.advance();
            const right = this.parseWith();
            left = { type: 'and', left, right };
        }

        return left;
    }

    private parseWith(): LicenseExpression {
        if (this.current().type === 'LPAREN') {
            this.advance();
            const inner = this.parseExpression();
            this.expect('RPAREN');
            return inner;
        }

        const token = this.current();
        if (token.type !== 'IDENT') {
            throw createParseError(
                token.type === 'EOF' ? 'Unexpected end of expression' : `Unexpected token '${token.value}'`,
                this.originalInput,
                token.position
            );
        }
        this.advance();

        const license = this.parseIdentity(token);

        let orLater = false;
        if (this.current().type === 'PLUS') {
            this.advance();
            orLater = true;
        }

        if (this.current().type !== 'WITH') {
            return { type: 'license', license, orLater };
        }

        this.advance();
        const exceptionToken = this.expect('IDENT');
        const exception = this.registry.mkLicenseExceptionId(exceptionToken.value);
        if (exception === undefined) {
            throw createUnknownExceptionError(exceptionToken.value, this.originalInput, exceptionToken.position);
        }
        return { type: 'license', license, orLater, exception };
    }

    private parseIdentity(token: Token): LicenseIdentity {
        const ref = LICENSE_REF.exec(token.value);
        if (ref) {
            return ref[1] !== undefined
                ? { kind: 'ref', document: ref[1], ref: ref[2] }
                : { kind: 'ref', ref: ref[2] };
        }

        if (token.value.includes(':')) {
            throw createParseError(
                `Malformed license reference '${token.value}'`,
                this.originalInput,
                token.position
            );
        }

        const id = this.registry.mkLicenseId(token.value);
        if (id === undefined) {
            throw createUnknownLicenseError(token.value, this.originalInput, token.position);
        }
        return { kind: 'id', id };
    }
}
