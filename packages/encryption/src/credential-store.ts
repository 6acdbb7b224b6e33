/**
 * Credential store contract and the in-memory backend.
 *
 * A credential store holds raw secret bytes under a fixed identifier. Every
 * backend must honour {@link CREDENTIAL_ACCESS_POLICY}: entries are readable
 * only while the device is unlocked, stay on this device, and are never
 * exported or synced.
 *
 * @module @clipkeep/encryption
 */

import { StoreError, noopLogger, type Logger } from '@clipkeep/core';

// ── Types ─────────────────────────────────────────────────

/** Access policy every credential backend enforces */
export interface CredentialAccessPolicy {
  readonly accessibility: 'when-unlocked';
  readonly thisDeviceOnly: true;
  readonly exportable: false;
}

/** Outcome of a save; store failures are values, never exceptions */
export type StoreResult = { ok: true } | { ok: false; error: StoreError };

export interface CredentialStore {
  /** Policy the backend enforces for its entries */
  readonly accessPolicy: CredentialAccessPolicy;
  /** Replace any entry for `identifier` with `bytes` (delete-then-insert) */
  save(identifier: string, bytes: Uint8Array): Promise<StoreResult>;
  /** Read the entry for `identifier`, or null when absent or unreadable */
  load(identifier: string): Promise<Uint8Array | null>;
  /** Remove the entry for `identifier`; resolves false when nothing was stored */
  delete(identifier: string): Promise<boolean>;
}

// ── Constants ─────────────────────────────────────────────

export const CREDENTIAL_ACCESS_POLICY: CredentialAccessPolicy = Object.freeze({
  accessibility: 'when-unlocked',
  thisDeviceOnly: true,
  exportable: false,
});

/** Account identifier the encryption key is stored under */
export const ENCRYPTION_KEY_IDENTIFIER = 'com.clipboardmanager.encryption.key';

// ── MemoryCredentialStore ─────────────────────────────────

export interface MemoryCredentialStoreConfig {
  logger?: Logger;
}

/**
 * Process-local credential store. Entries live as long as the instance.
 */
export class MemoryCredentialStore implements CredentialStore {
  readonly accessPolicy = CREDENTIAL_ACCESS_POLICY;

  private readonly entries = new Map<string, Uint8Array>();
  private readonly logger: Logger;
  private failWrites = false;
  private failReads = false;

  constructor(config: MemoryCredentialStoreConfig = {}) {
    this.logger = config.logger ?? noopLogger;
  }

  async save(identifier: string, bytes: Uint8Array): Promise<StoreResult> {
    this.entries.delete(identifier);

    if (this.failWrites) {
      const error = new StoreError('CLIP_S301', 'Failed to write to secure storage', {
        identifier,
      });
      this.logger.warn('Credential write failed', { identifier });
      return { ok: false, error };
    }

    this.entries.set(identifier, new Uint8Array(bytes));
    return { ok: true };
  }

  async load(identifier: string): Promise<Uint8Array | null> {
    if (this.failReads) {
      this.logger.warn('Credential read failed', { identifier });
      return null;
    }
    const stored = this.entries.get(identifier);
    return stored ? new Uint8Array(stored) : null;
  }

  async delete(identifier: string): Promise<boolean> {
    return this.entries.delete(identifier);
  }

  /** Whether an entry exists for `identifier` */
  has(identifier: string): boolean {
    return this.entries.has(identifier);
  }

  /** Number of stored entries */
  get size(): number {
    return this.entries.size;
  }

  /** Make subsequent writes and/or reads fail, to exercise degraded paths */
  simulateFailure(options: { writes?: boolean; reads?: boolean }): void {
    this.failWrites = options.writes ?? this.failWrites;
    this.failReads = options.reads ?? this.failReads;
  }
}

/** Create an in-memory credential store */
export function createMemoryCredentialStore(
  config?: MemoryCredentialStoreConfig
): MemoryCredentialStore {
  return new MemoryCredentialStore(config);
}
