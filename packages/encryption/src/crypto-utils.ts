import { CryptoError } from '@clipkeep/core';

/**
 * Crypto utilities on top of the Web Crypto API (`globalThis.crypto`)
 */

/**
 * Get the Web Crypto API
 */
export function getCrypto(): Crypto {
  if (typeof globalThis.crypto !== 'undefined') {
    return globalThis.crypto;
  }
  throw new CryptoError('CLIP_E400', 'Web Crypto API not available', {
    operation: 'getCrypto',
  });
}

/**
 * Get the SubtleCrypto API
 */
export function getSubtleCrypto(): SubtleCrypto {
  return getCrypto().subtle;
}

/**
 * Generate random bytes
 */
export function randomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  getCrypto().getRandomValues(bytes);
  return bytes;
}

/**
 * Copy bytes into a fresh ArrayBuffer-backed view, as SubtleCrypto expects.
 */
export function toBufferSource(bytes: Uint8Array): Uint8Array<ArrayBuffer> {
  return new Uint8Array(bytes);
}

/**
 * Encode bytes to base64
 */
export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode base64 to bytes. Returns null for input that is not canonical base64.
 */
export function fromBase64(base64: string): Uint8Array | null {
  if (base64.length % 4 !== 0 || !BASE64_PATTERN.test(base64)) {
    return null;
  }
  return new Uint8Array(Buffer.from(base64, 'base64'));
}

/**
 * Encode string to bytes
 */
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/**
 * Decode bytes to string. Returns null when the bytes are not valid UTF-8.
 */
export function bytesToString(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}
