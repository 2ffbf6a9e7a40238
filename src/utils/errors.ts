/**
 * Error types and codes for addonlint.
 * Every error raised by the tool extends AddonLintError.
 */

/**
 * Base error class for all addonlint errors.
 */
export class AddonLintError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AddonLintError';
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
 * Configuration errors (loading, parsing, validation).
 * The config loader turns these into a warning and falls back to defaults.
 */
export class ConfigError extends AddonLintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, unreadable input).
 */
export class SystemError extends AddonLintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A source unit could not be parsed. Fatal to that unit only.
 */
export class ExtractionError extends AddonLintError {
  constructor(
    code: string,
    message: string,
    public readonly line: number | null = null,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ExtractionError';
  }
}

/**
 * Version-control lookup failed. Callers degrade to an empty changed set.
 */
export class ScopeDetectionError extends AddonLintError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ScopeDetectionError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD: 'C001',
  CONFIG_INVALID: 'C002',
  INVALID_OPTION: 'C003',

  // Extraction
  PARSE_ERROR: 'S001',
  INVALID_MANIFEST: 'S002',
  FILE_NOT_FOUND: 'S003',

  // Scope detection
  GIT_FAILED: 'G001',
  GIT_TIMEOUT: 'G002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
