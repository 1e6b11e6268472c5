/**
 * Parser Types
 */

export type TokenType =
    | 'IDENT'         // MIT, GPL-2.0, LicenseRef-foo, DocumentRef-a:LicenseRef-b
    | 'AND'           // AND, and
    | 'OR'            // OR, or
    | 'WITH'          // WITH, with
    | 'PLUS'          // +
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
