/**
 * Error handling for file and tool operations
 */

/**
 * Specific error codes for tool failures
 */
export type GliffyErrorCode =
  | 'INVALID_JSON'
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'WRITE_ERROR'
  | 'INVALID_MAPPING'
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENTS'
  | 'UNKNOWN';

/**
 * Custom error class for conversion tool errors
 */
export class GliffyToolError extends Error {
  /**
   * Specific error code
   */
  readonly code: GliffyErrorCode;

  /**
   * Additional error details (paths, original messages)
   */
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: GliffyErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GliffyToolError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GliffyToolError);
    }
  }

  /**
   * Check if this is a specific error code
   */
  is(code: GliffyErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Get user-friendly error message
   */
  getUserMessage(): string {
    switch (this.code) {
      case 'INVALID_JSON':
        return 'The file is not valid JSON. Make sure it is a .gliffy export.';
      case 'FILE_NOT_FOUND':
        return 'The specified file or directory was not found.';
      case 'READ_ERROR':
        return 'The file could not be read. Check its permissions.';
      case 'WRITE_ERROR':
        return 'The output could not be written. Check the output directory.';
      case 'INVALID_MAPPING':
        return 'The TID mapping file is malformed.';
      case 'INVALID_CONFIG':
        return 'The configuration file is invalid.';
      case 'INVALID_ARGUMENTS':
        return this.message || 'Invalid tool arguments.';
      case 'UNKNOWN':
      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

function errnoCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function errnoPath(error: Error): string | undefined {
  return 'path' in error && typeof error.path === 'string' ? error.path : undefined;
}

/**
 * Create a GliffyToolError from an unknown error
 * Detects Node file-system errors and JSON parse failures
 */
export function createToolError(error: unknown): GliffyToolError {
  // Already a GliffyToolError
  if (error instanceof GliffyToolError) {
    return error;
  }

  if (error instanceof SyntaxError) {
    return new GliffyToolError('Invalid JSON', 'INVALID_JSON', { originalMessage: error.message });
  }

  if (error instanceof Error) {
    const path = errnoPath(error);

    switch (errnoCode(error)) {
      case 'ENOENT':
        return new GliffyToolError(
          path ? `File not found: ${path}` : 'File not found',
          'FILE_NOT_FOUND',
          { path }
        );
      case 'EACCES':
      case 'EPERM':
      case 'EISDIR':
        return new GliffyToolError(error.message, 'READ_ERROR', { path });
      case 'ENOSPC':
      case 'EROFS':
        return new GliffyToolError(error.message, 'WRITE_ERROR', { path });
    }

    // Generic error
    return new GliffyToolError(error.message, 'UNKNOWN', { originalError: error.name });
  }

  // String error
  if (typeof error === 'string') {
    return new GliffyToolError(error, 'UNKNOWN');
  }

  // Unknown error type
  return new GliffyToolError('An unknown error occurred', 'UNKNOWN', {
    originalError: String(error),
  });
}

/**
 * Type guard to check if an error is a GliffyToolError
 */
export function isGliffyToolError(error: unknown): error is GliffyToolError {
  return error instanceof GliffyToolError;
}

/**
 * Type guard to check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: GliffyErrorCode): boolean {
  return isGliffyToolError(error) && error.code === code;
}
