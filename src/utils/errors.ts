/**
 * Error types and codes for bridgegen.
 * All errors raised by the library extend BridgegenError.
 */

/**
 * Base error class for all bridgegen errors.
 */
export class BridgegenError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BridgegenError';
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
 * Fatal generation error. Raised for output folder problems, output path
 * collisions and malformed declarations; caught only by the orchestrator.
 */
export class GenerateError extends BridgegenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GenerateError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends BridgegenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends BridgegenError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Generation errors (G001-G008)
  FOLDER_BLOCKED: 'G001',
  FOLDER_CREATE_FAILED: 'G002',
  DUPLICATE_OUTPUT: 'G003',
  CASE_COLLISION: 'G004',
  INVALID_DECLARATION: 'G005',
  MISSING_BACKEND: 'G006',
  WRITE_FAILED: 'G007',
  MISSING_SETTING: 'G008',

  // Configuration errors (C001-C003)
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',
  UNKNOWN_IDENT_STYLE: 'C003',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  INVALID_DOCUMENT: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
