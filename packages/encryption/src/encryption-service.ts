/**
 * EncryptionService - custody of the clipboard payload key.
 *
 * The service starts uninitialized and touches neither the credential store
 * nor the random source until {@link EncryptionService.initialize} is called,
 * because the store may prompt the user for access.
 *
 * `encrypt`/`decrypt` are total: while uninitialized they return their input,
 * and any cryptographic failure also returns the input. Callers therefore
 * cannot use a decrypt result to detect corruption.
 *
 * @module @clipkeep/encryption
 */

import { Subject, type Observable } from 'rxjs';
import { CryptoError, ensureClipError, noopLogger, type Logger } from '@clipkeep/core';
import { AesGcmSealer, KEY_LENGTH_BYTES } from './aes-gcm.js';
import { ENCRYPTION_KEY_IDENTIFIER, type CredentialStore } from './credential-store.js';
import { bytesToString, fromBase64, getSubtleCrypto, stringToBytes, toBase64, toBufferSource } from './crypto-utils.js';
import type { EncryptionEvent, EncryptionEventType } from './types.js';

// ── Types ─────────────────────────────────────────────────

export interface EncryptionServiceConfig {
  /** Where the key is persisted */
  store: CredentialStore;
  /** Store identifier (default: {@link ENCRYPTION_KEY_IDENTIFIER}) */
  identifier?: string;
  logger?: Logger;
  /** Override the sealing primitive */
  sealer?: AesGcmSealer;
}

type KeyState =
  | { readonly kind: 'uninitialized' }
  | { readonly kind: 'initialized'; readonly key: CryptoKey; readonly length: number; readonly fingerprint: string };

const UNINITIALIZED: KeyState = { kind: 'uninitialized' };

// ── EncryptionService ─────────────────────────────────────

export class EncryptionService {
  private readonly store: CredentialStore;
  private readonly identifier: string;
  private readonly logger: Logger;
  private readonly sealer: AesGcmSealer;
  private readonly events$$ = new Subject<EncryptionEvent>();

  private state: KeyState = UNINITIALIZED;
  /** Serial queue for initialize/disable/destroyKey; readers wait for it to drain */
  private lifecycle: Promise<void> = Promise.resolve();

  /** Key lifecycle and fallback events */
  readonly events$: Observable<EncryptionEvent> = this.events$$.asObservable();

  constructor(config: EncryptionServiceConfig) {
    this.store = config.store;
    this.identifier = config.identifier ?? ENCRYPTION_KEY_IDENTIFIER;
    this.logger = config.logger ?? noopLogger;
    this.sealer = config.sealer ?? new AesGcmSealer();
    this.logger.debug('EncryptionService created; encryption disabled until initialized');
  }

  /** True iff a non-empty key is held in memory */
  get isEnabled(): boolean {
    return this.state.kind === 'initialized' && this.state.length > 0;
  }

  /** Short SHA-256 fingerprint of the current key, or null when uninitialized */
  get keyFingerprint(): string | null {
    return this.state.kind === 'initialized' ? this.state.fingerprint : null;
  }

  /**
   * Load the persisted key, or generate and persist a new one.
   * No-op when already initialized.
   */
  initialize(): Promise<void> {
    return this.enqueue(async () => {
      if (this.state.kind === 'initialized') {
        this.logger.debug('Encryption already initialized');
        return;
      }

      const stored = await this.store.load(this.identifier);
      if (stored && stored.length === KEY_LENGTH_BYTES) {
        this.state = await this.adopt(stored);
        this.emit('key:loaded');
        this.logger.info('Loaded existing encryption key');
        return;
      }

      if (stored) {
        this.logger.warn('Ignoring stored key with unexpected length', { length: stored.length });
      }

      const material = this.sealer.generateKeyMaterial();
      const result = await this.store.save(this.identifier, material);
      if (!result.ok) {
        this.emit('key:persist-failed', result.error);
        this.logger.warn('Encryption key kept in memory for this session only', {
          reason: result.error.message,
        });
      }

      this.state = await this.adopt(material);
      material.fill(0);
      this.emit('key:generated');
      this.logger.info('Generated new encryption key', { persisted: result.ok });
    });
  }

  /**
   * Drop the in-memory key. The persisted copy stays in the store so a later
   * `initialize()` adopts the same key.
   */
  disable(): Promise<void> {
    return this.enqueue(async () => {
      const hadKey = this.state.kind === 'initialized';
      this.state = UNINITIALIZED;
      if (hadKey) {
        this.emit('key:dropped');
      }
      this.logger.info('Encryption disabled');
    });
  }

  /**
   * Drop the in-memory key and delete the persisted copy. Payloads sealed
   * with the old key can no longer be opened.
   */
  destroyKey(): Promise<void> {
    return this.enqueue(async () => {
      this.state = UNINITIALIZED;
      const deleted = await this.store.delete(this.identifier);
      this.emit('key:destroyed');
      this.logger.info('Encryption key destroyed', { deleted });
    });
  }

  /**
   * Seal `bytes`. Returns the input unchanged while uninitialized or when
   * sealing fails.
   */
  async encrypt(bytes: Uint8Array): Promise<Uint8Array> {
    const state = await this.readState();
    if (state.kind === 'uninitialized') {
      return bytes;
    }

    try {
      return await this.sealer.seal(bytes, state.key);
    } catch (error) {
      const err = ensureClipError(error, 'CLIP_E400');
      this.emit('crypto:fallback', err);
      this.logger.warn('Encryption failed, storing payload unencrypted', { error: err.message });
      return bytes;
    }
  }

  /**
   * Open `bytes`. Returns the input unchanged while uninitialized or when
   * opening fails (legacy plaintext included).
   */
  async decrypt(bytes: Uint8Array): Promise<Uint8Array> {
    const state = await this.readState();
    if (state.kind === 'uninitialized') {
      return bytes;
    }

    try {
      return await this.sealer.open(bytes, state.key);
    } catch (error) {
      const err = ensureClipError(error, 'CLIP_E401');
      this.emit('crypto:fallback', err);
      this.logger.debug('Decryption failed (possibly unencrypted data)', { error: err.message });
      return bytes;
    }
  }

  /** Encrypt UTF-8 text and return base64 of the result */
  async encryptString(text: string): Promise<string> {
    const sealed = await this.encrypt(stringToBytes(text));
    return toBase64(sealed);
  }

  /**
   * Decode base64, decrypt and read as UTF-8. Null when the input is not
   * base64 or the result is not valid UTF-8.
   */
  async decryptString(encoded: string): Promise<string | null> {
    const bytes = fromBase64(encoded);
    if (!bytes) {
      return null;
    }
    return bytesToString(await this.decrypt(bytes));
  }

  encryptImage(imageData: Uint8Array): Promise<Uint8Array> {
    return this.encrypt(imageData);
  }

  decryptImage(encryptedData: Uint8Array): Promise<Uint8Array> {
    return this.decrypt(encryptedData);
  }

  /** Wait for pending lifecycle calls, then complete the event stream */
  async dispose(): Promise<void> {
    await this.lifecycle;
    this.events$$.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.lifecycle.then(task);
    this.lifecycle = run.then(
      () => undefined,
      (error: unknown) => {
        this.logger.error('Encryption lifecycle step failed', ensureClipError(error));
      }
    );
    return run;
  }

  private async readState(): Promise<KeyState> {
    await this.lifecycle;
    return this.state;
  }

  private async adopt(material: Uint8Array): Promise<KeyState> {
    const key = await this.sealer.importKey(material);
    const digest = await getSubtleCrypto().digest('SHA-256', toBufferSource(material));
    const fingerprint = Buffer.from(digest).toString('hex').slice(0, 16);
    return { kind: 'initialized', key, length: material.length, fingerprint };
  }

  private emit(type: EncryptionEventType, error?: CryptoError | Error): void {
    this.events$$.next({
      type,
      keyId: this.keyFingerprint ?? undefined,
      error,
      timestamp: Date.now(),
    });
  }
}

/** Create an encryption service. Performs no store access. */
export function createEncryptionService(config: EncryptionServiceConfig): EncryptionService {
  return new EncryptionService(config);
}
