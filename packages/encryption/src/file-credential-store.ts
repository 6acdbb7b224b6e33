/**
 * File-backed credential store.
 *
 * One file per identifier inside a device-local directory. The directory is
 * created `0700` and entries are written `0600`, so only the owning user can
 * read them; the directory must not live under a synced location.
 *
 * @module @clipkeep/encryption
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StoreError, noopLogger, type Logger } from '@clipkeep/core';
import {
  CREDENTIAL_ACCESS_POLICY,
  type CredentialStore,
  type StoreResult,
} from './credential-store.js';

export interface FileCredentialStoreConfig {
  /** Directory that holds the entries */
  directory: string;
  logger?: Logger;
}

const DIRECTORY_MODE = 0o700;
const ENTRY_MODE = 0o600;
const ENTRY_EXTENSION = '.key';

export class FileCredentialStore implements CredentialStore {
  readonly accessPolicy = CREDENTIAL_ACCESS_POLICY;

  private readonly directory: string;
  private readonly logger: Logger;

  constructor(config: FileCredentialStoreConfig) {
    this.directory = path.resolve(config.directory);
    this.logger = config.logger ?? noopLogger;
  }

  /** Absolute path of the entry file for `identifier` */
  entryPath(identifier: string): string {
    const safeName = identifier.replace(/[^A-Za-z0-9._-]/g, '_');
    return path.join(this.directory, `${safeName}${ENTRY_EXTENSION}`);
  }

  async save(identifier: string, bytes: Uint8Array): Promise<StoreResult> {
    const target = this.entryPath(identifier);

    try {
      await fs.mkdir(this.directory, { recursive: true, mode: DIRECTORY_MODE });
      await fs.rm(target, { force: true });
      await fs.writeFile(target, bytes, { mode: ENTRY_MODE, flag: 'wx' });
      return { ok: true };
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn('Credential write failed', { identifier, error: cause.message });
      return {
        ok: false,
        error: new StoreError('CLIP_S301', `Failed to save credential: ${cause.message}`, { identifier }, cause),
      };
    }
  }

  async load(identifier: string): Promise<Uint8Array | null> {
    try {
      const contents = await fs.readFile(this.entryPath(identifier));
      return new Uint8Array(contents);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      this.logger.warn('Credential read failed', {
        identifier,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async delete(identifier: string): Promise<boolean> {
    try {
      await fs.unlink(this.entryPath(identifier));
      return true;
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn('Credential delete failed', {
          identifier,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return false;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Create a file-backed credential store */
export function createFileCredentialStore(config: FileCredentialStoreConfig): FileCredentialStore {
  return new FileCredentialStore(config);
}
