/**
 * Shared type definitions for License Lattice
 */

// Re-export error types
export {
    LicenseException,
    getSuggestion,
    createParseError,
    createUnknownLicenseError,
    createUnknownExceptionError,
    createEmptyRangeError,
    createInvalidDataError,
    serializeLicenseError,
} from './errors.js';

export type {
    LicenseErrorCode,
    ErrorSpan,
    LicenseError,
} from './errors.js';

// Re-export lattice types
export type {
    LatticeNodeType,
    Lattice,
    Equality,
} from './lattice.js';

// Re-export license types
export type {
    LicenseRef,
    LicenseId,
    LicenseIdentity,
    LicenseExpressionType,
    LicenseExpression,
    Lic,
    LicenseInfo,
    LicenseExceptionInfo,
    RangeLookup,
} from './license.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    EmptyRangeMode,
    WarningHandler,
    EvaluationOptions,
    ParseOptions,
    TranslateOptions,
    SatisfiesOptions,
} from './options.js';
