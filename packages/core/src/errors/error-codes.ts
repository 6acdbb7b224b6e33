/**
 * clipkeep Error Codes
 *
 * Error codes are structured as CLIP_[CATEGORY][NUMBER]:
 * - V: Configuration/validation errors (V100-V199)
 * - S: Secure storage errors (S300-S399)
 * - E: Encryption errors (E400-E499)
 * - C: Connection/Sync errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  CLIP_V100: {
    code: 'CLIP_V100',
    message: 'Invalid configuration',
    suggestion: 'Check the configuration file against the documented options.',
  },

  // Secure storage errors (S300-S399)
  CLIP_S300: {
    code: 'CLIP_S300',
    message: 'Secure storage not available',
    suggestion: 'Make sure the credential directory exists and is writable by the current user.',
  },
  CLIP_S301: {
    code: 'CLIP_S301',
    message: 'Failed to write to secure storage',
    suggestion: 'The key stays usable for this session only. Check permissions on the credential directory.',
  },
  CLIP_S302: {
    code: 'CLIP_S302',
    message: 'Failed to read from secure storage',
    suggestion: 'The stored entry may be corrupted or unreadable by the current user.',
  },

  // Encryption errors (E400-E499)
  CLIP_E400: {
    code: 'CLIP_E400',
    message: 'Encryption failed',
    suggestion: 'The payload was stored without encryption.',
  },
  CLIP_E401: {
    code: 'CLIP_E401',
    message: 'Decryption failed',
    suggestion: 'The payload is either plaintext written before encryption was enabled or was sealed with another key.',
  },
  CLIP_E402: {
    code: 'CLIP_E402',
    message: 'Invalid key material',
    suggestion: 'Encryption keys must be exactly 32 bytes.',
  },

  // Connection/Sync errors (C500-C599)
  CLIP_C500: {
    code: 'CLIP_C500',
    message: 'Sync backend not available',
    suggestion: 'Run the application from a packaged build with a registered application identity.',
  },
  CLIP_C501: {
    code: 'CLIP_C501',
    message: 'Failed to check account status',
    suggestion: 'Sign in to the sync account on this device and try again.',
  },
  CLIP_C502: {
    code: 'CLIP_C502',
    message: 'Sync failed',
    suggestion: 'Trigger the sync again once pending writes can be flushed.',
  },
  CLIP_C503: {
    code: 'CLIP_C503',
    message: 'Operation timed out',
    suggestion: 'The sync backend did not answer in time. Try again later.',
  },

  // Internal errors (X900-X999)
  CLIP_X900: {
    code: 'CLIP_X900',
    message: 'Unknown error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
  CLIP_X901: {
    code: 'CLIP_X901',
    message: 'Invariant violated',
    suggestion: 'An internal state invariant was violated. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'storage' | 'encryption' | 'connection' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(5);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'S':
      return 'storage';
    case 'E':
      return 'encryption';
    case 'C':
      return 'connection';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
