/**
 * SyncOrchestrator - sequences every transition of the sync state machine.
 *
 * Node's event loop is the single context that owns {@link SyncState}: slow
 * steps (probe, account query, propagation wait) run as awaited tasks and
 * their results are written back in the continuation, so subscribers never
 * observe a partial update. Each slow step is bounded by a timeout that maps
 * to an `error` status.
 *
 * No step retries on its own. Recovery is an explicit `enable()` or
 * `triggerSync()` by the caller.
 */

import {
  ClipError,
  SyncError,
  delay,
  ensureClipError,
  noopLogger,
  withTimeout,
  type ErrorCode,
  type EventBus,
  type Logger,
} from '@clipkeep/core';
import { probeBackend } from './backend.js';
import type { SyncStateMachine, SyncStatePatch } from './sync-state.js';
import {
  IDLE_STATUS,
  errorStatus,
  type AccountCheckResult,
  type AccountStatus,
  type EnableResult,
  type EncryptionLifecycle,
  type PersistentStoreController,
  type RemoteStoreChangedEvent,
  type SecureSyncEvent,
  type SyncBackend,
  type SyncGuardResult,
  type SyncState,
  type SyncTrigger,
  type UserIntentStore,
} from './types.js';

// ── Config ────────────────────────────────────────────────

export interface SyncOrchestratorConfig {
  state: SyncStateMachine;
  encryption: EncryptionLifecycle;
  intentStore: UserIntentStore;
  backend: SyncBackend;
  store: PersistentStoreController;
  bus: EventBus<SecureSyncEvent>;
  /** Identity the application was packaged with; null when unpackaged */
  appIdentity: string | null;
  /** Grace interval after flushing, for backend propagation (default: 1000) */
  propagationDelayMs?: number;
  /** Availability probe budget (default: 10000) */
  probeTimeoutMs?: number;
  /** Account status query budget (default: 10000) */
  accountTimeoutMs?: number;
  /** Whole sync cycle budget (default: 30000) */
  syncTimeoutMs?: number;
  /** Identities treated as unpackaged development builds */
  developmentIdentities?: readonly string[];
  logger?: Logger;
  /** Clock (default: Date.now) */
  now?: () => number;
}

const DEFAULT_PROPAGATION_DELAY_MS = 1000;
const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const DEFAULT_ACCOUNT_TIMEOUT_MS = 10_000;
const DEFAULT_SYNC_TIMEOUT_MS = 30_000;

export const BACKEND_NOT_AVAILABLE_MESSAGE = 'Sync backend not available';

const SUPERSEDED_REASON = 'Superseded by a later disable';

// ── Pure decisions ────────────────────────────────────────

/**
 * Ordered preconditions of `triggerSync`. The first failing guard wins.
 */
export function evaluateSyncGuards(state: SyncState): SyncGuardResult {
  if (!state.backendAvailable) {
    return { ok: false, failed: 'backend-unavailable' };
  }
  if (!state.syncEnabled) {
    return { ok: false, failed: 'sync-disabled' };
  }
  if (state.accountStatus !== 'available') {
    return { ok: false, failed: 'account-unavailable' };
  }
  if (state.status.kind === 'syncing') {
    return { ok: false, failed: 'sync-in-progress' };
  }
  return { ok: true };
}

/**
 * `syncEnabled` after an account status answer. An available account only
 * turns sync on when the user opted in and the backend probe passed; any
 * other status turns it off.
 */
export function deriveSyncEnabled(state: SyncState, accountStatus: AccountStatus): boolean {
  return accountStatus === 'available' && state.userWantsSync && state.backendAvailable;
}

// ── SyncOrchestrator ──────────────────────────────────────

export class SyncOrchestrator {
  private readonly state: SyncStateMachine;
  private readonly encryption: EncryptionLifecycle;
  private readonly intentStore: UserIntentStore;
  private readonly backend: SyncBackend;
  private readonly store: PersistentStoreController;
  private readonly bus: EventBus<SecureSyncEvent>;
  private readonly appIdentity: string | null;
  private readonly config: {
    propagationDelayMs: number;
    probeTimeoutMs: number;
    accountTimeoutMs: number;
    syncTimeoutMs: number;
    developmentIdentities: readonly string[] | undefined;
  };
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly abortController = new AbortController();
  private readonly unsubscribers: (() => void)[] = [];
  /** Intent saves land in call order */
  private intentWrites: Promise<void> = Promise.resolve();

  /** Bumped by disable() and dispose(); results of older tasks are dropped */
  private generation = 0;
  private started = false;
  private disposed = false;

  constructor(config: SyncOrchestratorConfig) {
    this.state = config.state;
    this.encryption = config.encryption;
    this.intentStore = config.intentStore;
    this.backend = config.backend;
    this.store = config.store;
    this.bus = config.bus;
    this.appIdentity = config.appIdentity;
    this.config = {
      propagationDelayMs: config.propagationDelayMs ?? DEFAULT_PROPAGATION_DELAY_MS,
      probeTimeoutMs: config.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
      accountTimeoutMs: config.accountTimeoutMs ?? DEFAULT_ACCOUNT_TIMEOUT_MS,
      syncTimeoutMs: config.syncTimeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS,
      developmentIdentities: config.developmentIdentities,
    };
    this.logger = config.logger ?? noopLogger;
    this.now = config.now ?? Date.now;
  }

  /** Current state snapshot */
  get snapshot(): SyncState {
    return this.state.snapshot;
  }

  /**
   * Wire backend signals and re-attempt sync when the persisted intent says
   * the user opted in on a previous run.
   */
  async start(): Promise<SyncState> {
    if (this.started || this.disposed) {
      return this.snapshot;
    }
    this.started = true;

    this.unsubscribers.push(
      this.bus.subscribe('remote-store-changed', (event) => {
        this.handleRemoteChange(event);
      }),
      this.bus.subscribe('account-changed', async () => {
        await this.checkAccountStatus();
      })
    );

    let wantsSync = false;
    try {
      wantsSync = await this.intentStore.load();
    } catch (error) {
      this.logger.warn('Could not read sync preference; treating as opted out', {
        error: ensureClipError(error).message,
      });
    }

    if (!wantsSync) {
      this.logger.debug('Sync not requested by user');
      return this.snapshot;
    }

    this.logger.info('Restoring sync requested on a previous run');
    this.write({ userWantsSync: true });
    await this.checkAccountStatus();
    await this.enable();
    return this.snapshot;
  }

  /**
   * Opt in to sync. The intent is persisted before anything else, so it
   * survives even when the backend turns out to be unavailable.
   */
  async enable(): Promise<EnableResult> {
    if (this.disposed) {
      return { enabled: false, reason: 'Sync orchestrator disposed' };
    }
    const generation = this.generation;

    this.write({ userWantsSync: true });
    await this.persistIntent(true);

    if (this.isStale(generation)) {
      return { enabled: false, reason: SUPERSEDED_REASON };
    }

    try {
      await this.encryption.initialize();
    } catch (error) {
      this.logger.error('Encryption initialization failed', ensureClipError(error));
    }

    if (this.isStale(generation)) {
      return { enabled: false, reason: SUPERSEDED_REASON };
    }

    if (!this.snapshot.backendAvailable) {
      const probe = await probeBackend({
        appIdentity: this.appIdentity,
        backend: this.backend,
        timeoutMs: this.config.probeTimeoutMs,
        developmentIdentities: this.config.developmentIdentities,
      });

      if (this.isStale(generation)) {
        return { enabled: false, reason: SUPERSEDED_REASON };
      }

      if (!probe.available) {
        const message = probe.message ?? BACKEND_NOT_AVAILABLE_MESSAGE;
        this.write({ status: errorStatus(message), syncEnabled: false });
        this.logger.warn('Sync could not be enabled', { reason: message });
        return { enabled: false, reason: message };
      }

      this.write({ backendAvailable: true });
    }

    this.write({ syncEnabled: true });
    this.logger.info('Sync enabled by user', { accountStatus: this.snapshot.accountStatus });

    const sync = this.snapshot.accountStatus === 'available' ? this.triggerSync() : null;
    return { enabled: true, sync };
  }

  /**
   * Opt out of sync. Total: resets the flags whatever the prior state and
   * turns encryption off.
   */
  async disable(): Promise<SyncState> {
    this.generation++;
    this.write({ userWantsSync: false, syncEnabled: false, status: IDLE_STATUS });
    await this.persistIntent(false);

    try {
      await this.encryption.disable();
    } catch (error) {
      this.logger.error('Encryption disable failed', ensureClipError(error));
    }

    this.logger.info('Sync disabled by user; encryption disabled');
    return this.snapshot;
  }

  /**
   * Refresh the account status. No-op unless the user opted in.
   */
  async checkAccountStatus(): Promise<AccountCheckResult> {
    if (this.disposed || !this.snapshot.userWantsSync) {
      this.logger.debug('Account status check skipped; sync not requested');
      return { checked: false };
    }
    const generation = this.generation;

    try {
      const accountStatus = await withTimeout(
        this.backend.accountStatus(),
        this.config.accountTimeoutMs,
        'Account status query'
      );
      if (this.isStale(generation)) {
        return { checked: false };
      }

      this.write({
        accountStatus,
        syncEnabled: deriveSyncEnabled(this.snapshot, accountStatus),
      });
      this.logger.info('Account status updated', { accountStatus });
      return { checked: true, accountStatus };
    } catch (error) {
      if (this.isStale(generation)) {
        return { checked: false };
      }

      const err = toSyncError(error, 'CLIP_C501');
      this.write({
        accountStatus: 'unknown',
        syncEnabled: false,
        backendAvailable: false,
        status: errorStatus(`Failed to check account: ${err.message}`),
      });
      this.logger.error('Failed to check account status', err);
      return { checked: true, accountStatus: 'unknown', error: err };
    }
  }

  /**
   * Run a sync cycle when every precondition holds. The cycle itself runs
   * asynchronously; its promise is returned on the result.
   */
  triggerSync(): SyncTrigger {
    const guard = evaluateSyncGuards(this.snapshot);

    if (!guard.ok) {
      if (guard.failed === 'backend-unavailable' && !this.disposed) {
        this.state.markError(BACKEND_NOT_AVAILABLE_MESSAGE);
      }
      this.logger.debug('Sync not started', { failed: guard.failed });
      return guard;
    }

    return { ok: true, completion: this.performSync() };
  }

  /**
   * Flush pending local writes and wait for backend propagation.
   * Resolves after the state reached `success` or `error`.
   */
  async performSync(): Promise<void> {
    if (this.disposed) return;
    const generation = this.generation;
    const syncStartedAt = this.now();

    this.state.markSyncing();
    this.logger.debug('Starting sync');

    try {
      await withTimeout(this.runSyncCycle(), this.config.syncTimeoutMs, 'Sync');
      if (this.isStale(generation)) return;

      const finishedAt = this.now();
      this.state.markSuccess(finishedAt);
      this.logger.info('Sync completed', { durationMs: finishedAt - syncStartedAt });
    } catch (error) {
      if (this.isStale(generation)) return;

      const err = toSyncError(error, 'CLIP_C502');
      this.state.markError(`Sync failed: ${err.message}`);
      this.logger.error('Sync failed', err);
    }
  }

  /**
   * React to foreign writes. Leaves sync state untouched and tells local
   * consumers to refresh.
   */
  handleRemoteChange(notification: RemoteStoreChangedEvent): void {
    if (this.disposed) return;
    this.logger.debug('Received remote change notification', { storeId: notification.storeId });

    this.bus.publish({
      kind: 'clipboard-data-changed',
      reason: 'remote-change',
      receivedAt: this.now(),
      ...(notification.storeId !== undefined ? { storeId: notification.storeId } : {}),
    });
  }

  /**
   * Conflicts are merged by the backend; this only pushes local state
   * through another sync cycle.
   */
  async resolveConflicts(): Promise<SyncGuardResult> {
    const { backendAvailable, syncEnabled } = this.snapshot;
    if (!backendAvailable) {
      return { ok: false, failed: 'backend-unavailable' };
    }
    if (!syncEnabled) {
      return { ok: false, failed: 'sync-disabled' };
    }

    this.logger.debug('Resolving conflicts through a sync cycle');
    await this.performSync();
    return { ok: true };
  }

  /**
   * Detach from the bus, abort pending waits and complete the state stream.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.generation++;
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.abortController.abort(new Error('Sync orchestrator disposed'));
    this.state.complete();
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async runSyncCycle(): Promise<void> {
    if (this.store.hasPendingChanges()) {
      await this.store.flush();
    }
    await delay(this.config.propagationDelayMs, this.abortController.signal);
  }

  private persistIntent(wantsSync: boolean): Promise<void> {
    const run = this.intentWrites.then(async () => {
      try {
        await this.intentStore.save(wantsSync);
      } catch (error) {
        this.logger.error('Failed to persist sync preference', ensureClipError(error), { wantsSync });
      }
    });
    this.intentWrites = run;
    return run;
  }

  private isStale(generation: number): boolean {
    return this.disposed || generation !== this.generation;
  }

  private write(patch: SyncStatePatch): void {
    if (this.disposed) return;
    this.state.update(patch);
  }
}

/** Keep coded errors (timeouts included); describe anything else as a sync failure */
function toSyncError(error: unknown, code: ErrorCode): ClipError {
  if (error instanceof ClipError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  return new SyncError(code, cause ? cause.message : String(error), {}, cause);
}

/** Create a sync orchestrator */
export function createSyncOrchestrator(config: SyncOrchestratorConfig): SyncOrchestrator {
  return new SyncOrchestrator(config);
}
