/**
 * Error types and codes for sexpfmt.
 * All errors raised by the formatter extend SexpfmtError.
 */

/**
 * Base error class for all sexpfmt errors.
 */
export class SexpfmtError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SexpfmtError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends SexpfmtError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file access, stdin misuse, YAML syntax).
 */
export class SystemError extends SexpfmtError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/** Structural failures reported by the parser. */
export type ParseErrorKind =
  | 'MismatchedDelimiter'
  | 'UnexpectedClose'
  | 'UnclosedList'
  | 'DanglingQuote'
  | 'UnterminatedString'
  | 'UnterminatedComment';

/**
 * Structural parse failure at a 1-based source position.
 */
export class ParseError extends SexpfmtError {
  constructor(
    public readonly kind: ParseErrorKind,
    public readonly line: number,
    public readonly column: number,
    public readonly reason: string
  ) {
    super(ErrorCodes.PARSE_ERROR, `${reason} at line ${line}, column ${column}`, {
      kind,
      line,
      column,
    });
    this.name = 'ParseError';
  }
}

export const ErrorCodes = {
  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  FILE_READ_ERROR: 'S002',
  FILE_WRITE_ERROR: 'S003',
  STDIN_CHECK: 'S004',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
