/**
 * Structured Error System for License Lattice
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for license operations
 */
export type LicenseErrorCode =
  | 'PARSE_ERROR'           // Syntax errors in a license expression
  | 'UNKNOWN_LICENSE'       // Identifier not in the license registry
  | 'UNKNOWN_EXCEPTION'     // WITH operand not in the exception registry
  | 'EMPTY_RANGE'           // Or-later expansion produced no members
  | 'INVALID_DATA';         // Registry data failed validation

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LicenseError {
  code: LicenseErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic expression
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LicenseError for throw/catch patterns
 */
export class LicenseException extends Error {
  public readonly error: LicenseError;

  constructor(error: LicenseError) {
    super(error.message);
    this.name = 'LicenseException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LicenseException);
    }
  }

  get code(): LicenseErrorCode {
    return this.error.code;
  }

  toJSON(): LicenseError {
    return this.error;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /\b(AND|and)\s*$/,
      suggestion: "Incomplete conjunction - missing right operand after 'AND'"
    },
    {
      pattern: /\b(OR|or)\s*$/,
      suggestion: "Incomplete disjunction - missing right operand after 'OR'"
    },
    {
      pattern: /\b(WITH|with)\s*$/,
      suggestion: "Missing exception identifier after 'WITH'"
    },
    {
      pattern: /\b(And|Or|With)\b/,
      suggestion: "Operators must be all upper case ('AND') or all lower case ('and')"
    },
    {
      pattern: /\s\+/,
      suggestion: "Write '+' directly after the license identifier (e.g. 'GPL-2.0+')"
    },
    {
      pattern: /[&|]/,
      suggestion: "Use 'AND' and 'OR' instead of '&' and '|'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number
): LicenseException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new LicenseException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

/**
 * Create an unknown license identifier error
 */
export function createUnknownLicenseError(
  id: string,
  input?: string,
  position?: number
): LicenseException {
  return new LicenseException({
    code: 'UNKNOWN_LICENSE',
    message: `Unknown license identifier '${id}'`,
    span: position !== undefined ? { start: position, end: position + id.length } : undefined,
    suggestion: `Use 'LicenseRef-${id}' for licenses that are not registered`,
    context: input,
    details: { id },
  });
}

/**
 * Create an unknown license exception error
 */
export function createUnknownExceptionError(
  id: string,
  input?: string,
  position?: number
): LicenseException {
  return new LicenseException({
    code: 'UNKNOWN_EXCEPTION',
    message: `Unknown license exception identifier '${id}'`,
    span: position !== undefined ? { start: position, end: position + id.length } : undefined,
    context: input,
    details: { id },
  });
}

/**
 * Create an empty or-later range error
 */
export function createEmptyRangeError(id: string): LicenseException {
  return new LicenseException({
    code: 'EMPTY_RANGE',
    message: `License range for '${id}+' has no members`,
    suggestion: "Check the range table, or translate with emptyRange: 'bottom'",
    details: { id },
  });
}

/**
 * Create a registry data validation error
 */
export function createInvalidDataError(
  message: string,
  details?: Record<string, unknown>
): LicenseException {
  return new LicenseException({
    code: 'INVALID_DATA',
    message: `Invalid license data: ${message}`,
    details,
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LicenseError for JSON output
 */
export function serializeLicenseError(error: LicenseError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
