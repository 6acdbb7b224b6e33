import { CryptoError } from '@clipkeep/core';
import { concatBytes, getSubtleCrypto, randomBytes, toBufferSource } from './crypto-utils.js';

/**
 * Key size in bytes (256 bits)
 */
export const KEY_LENGTH_BYTES = 32;

/**
 * Nonce size for AES-GCM
 */
export const NONCE_LENGTH_BYTES = 12;

/**
 * Tag size for AES-GCM (128 bits)
 */
const GCM_TAG_LENGTH = 128;
export const TAG_LENGTH_BYTES = GCM_TAG_LENGTH / 8;

/**
 * AES-256-GCM sealing in the combined wire format `nonce ∥ ciphertext ∥ tag`.
 */
export class AesGcmSealer {
  /**
   * Import raw key bytes as a non-extractable AES-GCM key
   */
  async importKey(raw: Uint8Array): Promise<CryptoKey> {
    if (raw.length !== KEY_LENGTH_BYTES) {
      throw new CryptoError('CLIP_E402', `Expected ${KEY_LENGTH_BYTES} key bytes, got ${raw.length}`, {
        length: raw.length,
      });
    }

    return getSubtleCrypto().importKey(
      'raw',
      toBufferSource(raw),
      { name: 'AES-GCM', length: KEY_LENGTH_BYTES * 8 },
      false,
      ['encrypt', 'decrypt']
    );
  }

  /**
   * Generate fresh raw key material
   */
  generateKeyMaterial(): Uint8Array {
    return randomBytes(KEY_LENGTH_BYTES);
  }

  /**
   * Seal `data` under `key` with a fresh nonce
   */
  async seal(data: Uint8Array, key: CryptoKey): Promise<Uint8Array> {
    const nonce = this.generateNonce();

    try {
      // Web Crypto appends the tag to the ciphertext
      const encrypted = await getSubtleCrypto().encrypt(
        { name: 'AES-GCM', iv: toBufferSource(nonce), tagLength: GCM_TAG_LENGTH },
        key,
        toBufferSource(data)
      );
      return concatBytes(nonce, new Uint8Array(encrypted));
    } catch (error) {
      throw new CryptoError(
        'CLIP_E400',
        'AES-GCM seal failed',
        { length: data.length },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Authenticate and open a combined blob
   */
  async open(blob: Uint8Array, key: CryptoKey): Promise<Uint8Array> {
    if (blob.length < NONCE_LENGTH_BYTES + TAG_LENGTH_BYTES) {
      throw new CryptoError('CLIP_E401', 'Blob is shorter than nonce and tag', {
        length: blob.length,
      });
    }

    const nonce = blob.subarray(0, NONCE_LENGTH_BYTES);
    const sealed = blob.subarray(NONCE_LENGTH_BYTES);

    try {
      const decrypted = await getSubtleCrypto().decrypt(
        { name: 'AES-GCM', iv: toBufferSource(nonce), tagLength: GCM_TAG_LENGTH },
        key,
        toBufferSource(sealed)
      );
      return new Uint8Array(decrypted);
    } catch (error) {
      throw new CryptoError(
        'CLIP_E401',
        'AES-GCM authentication failed',
        { length: blob.length },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Generate a random nonce
   */
  generateNonce(): Uint8Array {
    return randomBytes(NONCE_LENGTH_BYTES);
  }
}

/** Create an AES-GCM sealer */
export function createAesGcmSealer(): AesGcmSealer {
  return new AesGcmSealer();
}
