/**
 * Sync status. `syncing` is transient: every cycle ends in `success` or `error`.
 */
export type SyncStatus =
  | { readonly kind: 'idle' }
  | { readonly kind: 'syncing' }
  | { readonly kind: 'success' }
  | { readonly kind: 'error'; readonly message: string };

export const IDLE_STATUS: SyncStatus = { kind: 'idle' };
export const SYNCING_STATUS: SyncStatus = { kind: 'syncing' };
export const SUCCESS_STATUS: SyncStatus = { kind: 'success' };

export function errorStatus(message: string): SyncStatus {
  return { kind: 'error', message };
}

export function statusEquals(a: SyncStatus, b: SyncStatus): boolean {
  if (a.kind === 'error' && b.kind === 'error') {
    return a.message === b.message;
  }
  return a.kind === b.kind;
}

/**
 * Account status reported by the sync backend
 */
export type AccountStatus =
  | 'available'
  | 'no-account'
  | 'restricted'
  | 'unknown'
  | 'temporarily-unavailable';

/**
 * Observable sync state. Invariant: `syncEnabled` implies `backendAvailable`.
 */
export interface SyncState {
  readonly status: SyncStatus;
  /** Epoch millis of the last successful sync */
  readonly lastSyncTimestamp: number | null;
  readonly accountStatus: AccountStatus;
  readonly backendAvailable: boolean;
  readonly syncEnabled: boolean;
  /** Persisted user intent; survives restarts */
  readonly userWantsSync: boolean;
}

export const INITIAL_SYNC_STATE: SyncState = {
  status: IDLE_STATUS,
  lastSyncTimestamp: null,
  accountStatus: 'unknown',
  backendAvailable: false,
  syncEnabled: false,
  userWantsSync: false,
};

// ── Guards ────────────────────────────────────────────────

/** Which precondition of `triggerSync` failed, in check order */
export type SyncGuardFailure =
  | 'backend-unavailable'
  | 'sync-disabled'
  | 'account-unavailable'
  | 'sync-in-progress';

export type SyncGuardResult = { ok: true } | { ok: false; failed: SyncGuardFailure };

/** Result of `triggerSync`; carries the dispatched cycle when one started */
export type SyncTrigger =
  | { ok: true; completion: Promise<void> }
  | { ok: false; failed: SyncGuardFailure };

export type EnableResult =
  | { enabled: true; sync: SyncTrigger | null }
  | { enabled: false; reason: string };

export type AccountCheckResult =
  | { checked: false }
  | { checked: true; accountStatus: AccountStatus; error?: Error };

// ── Collaborators ─────────────────────────────────────────

/** Outcome of a backend availability probe */
export interface BackendProbe {
  available: boolean;
  /** Diagnostic message; always set when unavailable */
  message?: string;
}

/**
 * Remote, eventually-consistent sync backend. Conflict merging is its job.
 */
export interface SyncBackend {
  /** Whether this process can reach the backend at all */
  checkAvailability(): Promise<BackendProbe>;
  /** Account status of the signed-in user */
  accountStatus(): Promise<AccountStatus>;
}

/**
 * Local persistent store whose pending writes the backend mirrors
 */
export interface PersistentStoreController {
  hasPendingChanges(): boolean;
  /** Write pending changes; rejects on failure */
  flush(): Promise<void>;
}

/**
 * Persistence for the user's sync opt-in
 */
export interface UserIntentStore {
  load(): Promise<boolean>;
  save(wantsSync: boolean): Promise<void>;
}

/**
 * Encryption lifecycle the orchestrator drives in lock-step with sync
 */
export interface EncryptionLifecycle {
  initialize(): Promise<void>;
  disable(): Promise<void>;
}

// ── Events ────────────────────────────────────────────────

/** Backend push notification about foreign writes */
export interface RemoteStoreChangedEvent {
  readonly kind: 'remote-store-changed';
  readonly receivedAt: number;
  /** Identifier of the store that changed, when the backend says */
  readonly storeId?: string;
}

/** Backend signal that the device's account credentials changed */
export interface AccountChangedEvent {
  readonly kind: 'account-changed';
  readonly receivedAt: number;
}

/** Local broadcast so views refresh after remote writes */
export interface ClipboardDataChangedEvent {
  readonly kind: 'clipboard-data-changed';
  readonly receivedAt: number;
  readonly reason: 'remote-change';
  readonly storeId?: string;
}

export type SecureSyncEvent = RemoteStoreChangedEvent | AccountChangedEvent | ClipboardDataChangedEvent;
