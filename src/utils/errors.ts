/**
 * Error types and codes for templatize.
 * Every error raised on purpose by the engine or the CLI extends TemplatizeError.
 */

/**
 * Base error class for all templatize errors.
 */
export class TemplatizeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TemplatizeError';
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
 * Caller input rejected before any filesystem access.
 * Error codes: V001-V002
 */
export class ValidationError extends TemplatizeError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Filesystem and internal failures that abort an invocation.
 * Error codes: S001-S005
 */
export class SystemError extends TemplatizeError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends TemplatizeError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  // Validation errors (V001-V002)
  INVALID_COMPOUND_WORD: 'V001',
  NO_TRANSFORM_SELECTED: 'V002',

  // System errors (S001-S005)
  TARGET_NOT_FOUND: 'S001',
  UNSUPPORTED_TARGET: 'S002',
  RENAME_COLLISION: 'S003',
  PATTERN_ERROR: 'S004',
  PARSE_ERROR: 'S005',

  // Config errors (C001-C002)
  INVALID_CONFIG: 'C001',
  CONFIG_LOAD_ERROR: 'C002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
