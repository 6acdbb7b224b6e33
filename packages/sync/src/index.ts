/**
 * @clipkeep/sync - multi-device sync supervision
 *
 * ```
 *   settings UI ──enable()/disable()──▶ SyncOrchestrator ──▶ EncryptionLifecycle
 *                                          │      ▲
 *                      probe / account /   │      │ remote-store-changed
 *                      flush + propagate   ▼      │ account-changed
 *                                     SyncBackend  EventBus ──▶ clipboard-data-changed
 *                                          │
 *                                          ▼
 *                                   SyncStateMachine ──state$──▶ subscribers
 * ```
 *
 * The backend is opaque and merges conflicts itself; this package only
 * gates, sequences and reports.
 *
 * @packageDocumentation
 */

// Types
export * from './types.js';

// State
export {
  SyncStateMachine,
  createSyncStateMachine,
  type SyncStatePatch,
} from './sync-state.js';

// Backend helpers
export {
  DEVELOPMENT_ENVIRONMENT_MESSAGE,
  DEVELOPMENT_IDENTITIES,
  OfflineSyncBackend,
  accountStatusMessage,
  createOfflineSyncBackend,
  probeBackend,
  type ProbeOptions,
} from './backend.js';

// User intent
export {
  FileUserIntentStore,
  MemoryUserIntentStore,
  SYNC_INTENT_PREFERENCE_KEY,
  createFileUserIntentStore,
  type FileUserIntentStoreConfig,
} from './user-intent.js';

// Orchestrator
export {
  BACKEND_NOT_AVAILABLE_MESSAGE,
  SyncOrchestrator,
  createSyncOrchestrator,
  deriveSyncEnabled,
  evaluateSyncGuards,
  type SyncOrchestratorConfig,
} from './sync-orchestrator.js';
