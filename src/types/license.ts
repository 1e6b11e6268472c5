/**
 * License Expression Types
 */

/**
 * A free-form `[DocumentRef-<document>:]LicenseRef-<ref>` reference.
 * Both parts are stored without their prefixes.
 */
export interface LicenseRef {
    kind: 'ref';
    document?: string;
    ref: string;
}

/**
 * A registered license identifier, in its canonical spelling.
 */
export interface LicenseId {
    kind: 'id';
    id: string;
}

export type LicenseIdentity = LicenseId | LicenseRef;

export type LicenseExpressionType = 'license' | 'and' | 'or';

export type LicenseExpression =
    | {
        type: 'license';
        license: LicenseIdentity;
        orLater: boolean;           // `+` suffix
        exception?: string;         // `WITH` operand, canonical spelling
    }
    | { type: 'and'; left: LicenseExpression; right: LicenseExpression }
    | { type: 'or'; left: LicenseExpression; right: LicenseExpression };

/**
 * Atomic term of a license formula: a license identity plus optional exception.
 */
export interface Lic {
    license: LicenseIdentity;
    exception?: string;
}

export interface LicenseInfo {
    id: string;
    name: string;
    osiApproved: boolean;
    deprecated: boolean;
}

export interface LicenseExceptionInfo {
    id: string;
    name: string;
}

/**
 * Ordered members of a license family, starting from a given identifier.
 */
export type RangeLookup = (id: string) => readonly string[];
