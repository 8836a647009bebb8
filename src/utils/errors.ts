/**
 * Error types and codes for appforge.
 * Every error raised by the engine extends AppForgeError so callers can map
 * it to an exit code and print its structured details.
 */

/**
 * Base error class for all appforge errors.
 */
export class AppForgeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppForgeError';
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
 * Project root cannot be scanned (missing, not a directory, permission denied).
 */
export class ScanError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ScanError';
  }
}

/**
 * Unknown generator id.
 */
export class NotFoundError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Invalid configuration value for a generator option.
 */
export class ValidationError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * The user cancelled while a value or a decision was being requested.
 */
export class CancelledError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CancelledError';
  }
}

/**
 * A template cannot be rendered safely with the given configuration.
 */
export class RenderError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RenderError';
  }
}

/**
 * A filesystem write failed while applying a plan. Raised after rollback.
 */
export class WriteError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'WriteError';
  }
}

/**
 * A generator requires capabilities that were not authorized.
 */
export class CapabilityError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CapabilityError';
  }
}

/**
 * Template Store errors (missing files, unsupported schema version).
 */
export class StoreError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StoreError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse errors, unreadable files).
 */
export class SystemError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Security errors (path traversal outside the project root).
 */
export class SecurityError extends AppForgeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Scan errors
  ROOT_NOT_FOUND: 'SCAN001',
  ROOT_NOT_DIRECTORY: 'SCAN002',
  ROOT_NOT_READABLE: 'SCAN003',

  // Catalog
  UNKNOWN_GENERATOR: 'CAT001',

  // Conflicts
  BLOCKING_CONFLICT: 'CON001',

  // Configuration resolution
  INVALID_OPTION_VALUE: 'VAL001',
  UNKNOWN_OPTION: 'VAL002',
  MISSING_OPTION_VALUE: 'VAL003',
  PROMPT_CANCELLED: 'CAN001',
  CONFLICT_ABORTED: 'CAN002',

  // Rendering
  TEMPLATE_SYNTAX: 'REN001',
  UNKNOWN_PLACEHOLDER: 'REN002',
  UNSAFE_VALUE: 'REN003',
  UNKNOWN_FILTER: 'REN004',
  DUPLICATE_TARGET: 'REN005',

  // Writing
  WRITE_FAILED: 'WRI001',
  CHECKSUM_MISMATCH: 'WRI002',
  TARGET_UNREADABLE: 'WRI003',

  // Capabilities
  CAPABILITY_DENIED: 'CAP001',

  // Template Store
  STORE_NOT_FOUND: 'STO001',
  UNSUPPORTED_SCHEMA_VERSION: 'STO002',
  TEMPLATE_MISSING: 'STO003',
  DUPLICATE_OPTION: 'STO004',

  // Config and system
  CONFIG_LOAD_ERROR: 'CFG001',
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',

  // Security
  PATH_TRAVERSAL: 'SEC001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
