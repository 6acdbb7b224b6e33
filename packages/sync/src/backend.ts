/**
 * Backend availability probing and account status helpers.
 */

import { ensureClipError, withTimeout } from '@clipkeep/core';
import type { AccountStatus, BackendProbe, SyncBackend } from './types.js';

/**
 * Application identities that mark an unpackaged development build. Such a
 * process has no backend entitlement, so probing it must not be attempted.
 */
export const DEVELOPMENT_IDENTITIES: readonly string[] = ['ClipboardManager'];

export const DEVELOPMENT_ENVIRONMENT_MESSAGE = 'Sync backend not available in development environment';

export interface ProbeOptions {
  /** Identity the running application was packaged with; null when unpackaged */
  appIdentity: string | null | undefined;
  backend: SyncBackend;
  timeoutMs: number;
  developmentIdentities?: readonly string[];
}

/**
 * Decide whether the sync backend can be used from this process.
 * Never throws and never waits longer than `timeoutMs`.
 */
export async function probeBackend(options: ProbeOptions): Promise<BackendProbe> {
  const identity = options.appIdentity?.trim() ?? '';
  const placeholders = options.developmentIdentities ?? DEVELOPMENT_IDENTITIES;

  if (identity === '' || placeholders.includes(identity)) {
    return { available: false, message: DEVELOPMENT_ENVIRONMENT_MESSAGE };
  }

  try {
    const probe = await withTimeout(
      options.backend.checkAvailability(),
      options.timeoutMs,
      'Backend availability probe'
    );
    if (!probe.available) {
      return { available: false, message: probe.message ?? 'Sync backend not available' };
    }
    return probe;
  } catch (error) {
    const err = ensureClipError(error, 'CLIP_C500');
    return { available: false, message: `Sync backend probe failed: ${err.message}` };
  }
}

/**
 * Human-readable account status
 */
export function accountStatusMessage(status: AccountStatus): string {
  switch (status) {
    case 'available':
      return 'Sync account available';
    case 'no-account':
      return 'No sync account signed in';
    case 'restricted':
      return 'Sync account restricted';
    case 'unknown':
      return 'Sync account status unknown';
    case 'temporarily-unavailable':
      return 'Sync account temporarily unavailable';
  }
}

/**
 * Backend for processes with no sync service wired in. Always unavailable.
 */
export class OfflineSyncBackend implements SyncBackend {
  constructor(private readonly reason = 'No sync backend configured') {}

  async checkAvailability(): Promise<BackendProbe> {
    return { available: false, message: this.reason };
  }

  async accountStatus(): Promise<AccountStatus> {
    return 'unknown';
  }
}

export function createOfflineSyncBackend(reason?: string): OfflineSyncBackend {
  return new OfflineSyncBackend(reason);
}
