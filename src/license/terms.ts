import type { Lic, LicenseIdentity } from '../types/index.js';

export function identityEquals(a: LicenseIdentity, b: LicenseIdentity): boolean {
    if (a.kind === 'id' && b.kind === 'id') {
        return a.id === b.id;
    }
    if (a.kind === 'ref' && b.kind === 'ref') {
        return a.ref === b.ref && a.document === b.document;
    }
    return false;
}

/**
 * Structural equality of license terms
 */
export function licEquals(a: Lic, b: Lic): boolean {
    return identityEquals(a.license, b.license) && a.exception === b.exception;
}

export function identityToString(identity: LicenseIdentity): string {
    if (identity.kind === 'id') {
        return identity.id;
    }
    const ref = `LicenseRef-${identity.ref}`;
    return identity.document !== undefined ? `DocumentRef-${identity.document}:${ref}` : ref;
}

export function licToString(lic: Lic): string {
    const id = identityToString(lic.license);
    return lic.exception !== undefined ? `${id} WITH ${lic.exception}` : id;
}
