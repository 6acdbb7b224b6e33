/**
 * clipkeep Error System
 *
 * Every failure inside the secure-sync subsystem is described by a
 * {@link ClipError} carrying a stable code, a category and context. Most of
 * them never reach callers: they are logged, or mapped to a sync status.
 *
 * @example
 * ```typescript
 * const result = await store.save(identifier, bytes);
 * if (!result.ok && result.error.code === 'CLIP_S301') {
 *   logger.warn('Key kept in memory only', { reason: result.error.message });
 * }
 * ```
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  ClipError,
  ConfigError,
  CryptoError,
  StoreError,
  SyncError,
  TimeoutError,
  ensureClipError,
  type ClipErrorOptions,
} from './clip-error.js';
