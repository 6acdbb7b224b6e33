/**
 * ClipError - structured error class shared by every clipkeep package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a ClipError
 */
export interface ClipErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Error class for clipkeep with structured error information.
 *
 * @example
 * ```typescript
 * throw new ClipError({
 *   code: 'CLIP_S301',
 *   context: { identifier: 'com.clipboardmanager.encryption.key' }
 * });
 *
 * // Or with custom message
 * throw new ClipError({
 *   code: 'CLIP_C500',
 *   message: 'Sync backend not available in development environment',
 * });
 * ```
 */
export class ClipError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: ClipErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'ClipError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ClipError);
    }
  }

  /**
   * Wrap an existing error with a ClipError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): ClipError {
    return new ClipError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a ClipError
   */
  static isClipError(error: unknown): error is ClipError {
    return error instanceof ClipError;
  }
}

/**
 * Secure storage error (credential store, preference files)
 */
export class StoreError extends ClipError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StoreError';
  }
}

/**
 * Sealing or opening a payload failed. Never thrown across the
 * EncryptionService boundary; carried on fallback events instead.
 */
export class CryptoError extends ClipError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'CryptoError';
  }
}

/**
 * Backend, account or sync failure
 */
export class SyncError extends ClipError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'SyncError';
  }
}

/**
 * An async step exceeded its time budget
 */
export class TimeoutError extends ClipError {
  /** The operation that timed out */
  readonly operation: string;
  /** The budget in milliseconds */
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super({
      code: 'CLIP_C503',
      message: `${operation} timed out after ${timeoutMs}ms`,
      context: { operation, timeoutMs },
    });
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Configuration file or option failed validation
 */
export class ConfigError extends ClipError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'CLIP_V100', message, context, cause });
    this.name = 'ConfigError';
  }
}

/**
 * Helper function to ensure errors are ClipErrors
 */
export function ensureClipError(error: unknown, defaultCode: ErrorCode = 'CLIP_X900'): ClipError {
  if (ClipError.isClipError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return ClipError.wrap(error, defaultCode);
  }

  return new ClipError({
    code: defaultCode,
    message: String(error),
  });
}
