/**
 * SyncStateMachine - the single observable holder of {@link SyncState}.
 *
 * Every mutation emits one frozen snapshot on `state$`. Patches are applied
 * atomically, and a patch that would leave `syncEnabled` on without
 * `backendAvailable` is rejected.
 */

import { BehaviorSubject, distinctUntilChanged, map, type Observable } from 'rxjs';
import { ClipError } from '@clipkeep/core';
import {
  INITIAL_SYNC_STATE,
  SUCCESS_STATUS,
  SYNCING_STATUS,
  errorStatus,
  statusEquals,
  type SyncState,
  type SyncStatus,
} from './types.js';

export type SyncStatePatch = Partial<SyncState>;

export class SyncStateMachine {
  private readonly state$$: BehaviorSubject<SyncState>;
  private closed = false;

  /** Current state followed by every later snapshot */
  readonly state$: Observable<SyncState>;

  /** Status changes only */
  readonly status$: Observable<SyncStatus>;

  constructor(initial: SyncStatePatch = {}) {
    const state = Object.freeze({ ...INITIAL_SYNC_STATE, ...initial });
    assertInvariants(state);
    this.state$$ = new BehaviorSubject<SyncState>(state);
    this.state$ = this.state$$.asObservable();
    this.status$ = this.state$.pipe(
      map((s) => s.status),
      distinctUntilChanged(statusEquals)
    );
  }

  get snapshot(): SyncState {
    return this.state$$.getValue();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Apply a patch and emit the new snapshot. Ignored once closed.
   */
  update(patch: SyncStatePatch): SyncState {
    if (this.closed) {
      return this.snapshot;
    }

    const next = Object.freeze({ ...this.snapshot, ...patch });
    assertInvariants(next);
    this.state$$.next(next);
    return next;
  }

  markSyncing(): SyncState {
    return this.update({ status: SYNCING_STATUS });
  }

  markSuccess(timestamp: number): SyncState {
    return this.update({ status: SUCCESS_STATUS, lastSyncTimestamp: timestamp });
  }

  markError(message: string): SyncState {
    return this.update({ status: errorStatus(message) });
  }

  /** Complete the streams; later updates are ignored */
  complete(): void {
    if (this.closed) return;
    this.closed = true;
    this.state$$.complete();
  }
}

function assertInvariants(state: SyncState): void {
  if (state.syncEnabled && !state.backendAvailable) {
    throw new ClipError({
      code: 'CLIP_X901',
      message: 'syncEnabled requires backendAvailable',
      context: { syncEnabled: state.syncEnabled, backendAvailable: state.backendAvailable },
    });
  }
}

/** Create a sync state machine */
export function createSyncStateMachine(initial?: SyncStatePatch): SyncStateMachine {
  return new SyncStateMachine(initial);
}
