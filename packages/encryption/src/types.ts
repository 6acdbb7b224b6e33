/**
 * Encryption event types
 */
export type EncryptionEventType =
  | 'key:loaded'
  | 'key:generated'
  | 'key:persist-failed'
  | 'key:dropped'
  | 'key:destroyed'
  | 'crypto:fallback';

/**
 * Encryption event
 */
export interface EncryptionEvent {
  type: EncryptionEventType;
  /** Fingerprint of the key in use, when one is held */
  keyId?: string;
  error?: Error;
  timestamp: number;
}

/**
 * Clipboard record as the application sees it
 */
export interface ClipboardPayload {
  /** Text content, when the entry holds text */
  content?: string;
  /** Raw image bytes, when the entry holds an image */
  imageData?: Uint8Array;
}

/**
 * Clipboard record as it is written to the persistent store
 */
export interface StoredClipboardPayload {
  /** Base64 of the sealed (or passthrough) UTF-8 text */
  encryptedContent?: string;
  /** Sealed (or passthrough) image bytes */
  encryptedImageData?: Uint8Array;
}
