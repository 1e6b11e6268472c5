export {
    createLicenseRegistry,
    licenseDataSchema,
    defaultRegistry,
    licenses,
    licenseIdentifiers,
    mkLicenseId,
    isOsiApproved,
    licenseExceptions,
    mkLicenseExceptionId,
    licenseRanges,
    lookupLicenseRange,
} from './registry.js';

export type { LicenseRegistry, LicenseDataInput } from './registry.js';

export { identityEquals, licEquals, identityToString, licToString } from './terms.js';
export { expressionToString } from './printer.js';
export { exprToLattice } from './translate.js';
export { satisfies, toExpression } from './satisfies.js';
export type { ExpressionInput } from './satisfies.js';
