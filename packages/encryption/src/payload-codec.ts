/**
 * Maps clipboard records to their stored form through the EncryptionService.
 *
 * Text is stored as base64 of the sealed bytes; images as sealed bytes. While
 * encryption is disabled both pass through, so records written before sync was
 * ever enabled read back unchanged.
 *
 * @module @clipkeep/encryption
 */

import type { EncryptionService } from './encryption-service.js';
import type { ClipboardPayload, StoredClipboardPayload } from './types.js';

export class SecureClipboardCodec {
  constructor(private readonly encryption: EncryptionService) {}

  /** Seal the fields that are present */
  async encode(payload: ClipboardPayload): Promise<StoredClipboardPayload> {
    const stored: StoredClipboardPayload = {};

    if (payload.content !== undefined) {
      stored.encryptedContent = await this.encryption.encryptString(payload.content);
    }
    if (payload.imageData !== undefined) {
      stored.encryptedImageData = await this.encryption.encryptImage(payload.imageData);
    }

    return stored;
  }

  /** Open the fields that are present; unreadable text reads as absent */
  async decode(stored: StoredClipboardPayload): Promise<ClipboardPayload> {
    const payload: ClipboardPayload = {};

    if (stored.encryptedContent !== undefined) {
      const content = await this.encryption.decryptString(stored.encryptedContent);
      if (content !== null) {
        payload.content = content;
      }
    }
    if (stored.encryptedImageData !== undefined) {
      payload.imageData = await this.encryption.decryptImage(stored.encryptedImageData);
    }

    return payload;
  }
}

/** Create a codec bound to an encryption service */
export function createSecureClipboardCodec(encryption: EncryptionService): SecureClipboardCodec {
  return new SecureClipboardCodec(encryption);
}
