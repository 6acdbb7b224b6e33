/**
 * Composition root for the secure-sync subsystem.
 *
 * Each call builds its own set of components; nothing is shared between
 * instances, so tests and multi-profile hosts can run several side by side.
 *
 * @module clipkeep/secure-sync
 */

import { ClipLogger, createEventBus, createLogger, type EventBus, type Logger } from '@clipkeep/core';
import {
  EncryptionService,
  SecureClipboardCodec,
  createFileCredentialStore,
  type CredentialStore,
} from '@clipkeep/encryption';
import {
  OfflineSyncBackend,
  SyncOrchestrator,
  SyncStateMachine,
  createFileUserIntentStore,
  type PersistentStoreController,
  type SecureSyncEvent,
  type SyncBackend,
  type SyncState,
  type SyncStatePatch,
  type UserIntentStore,
} from '@clipkeep/sync';
import { defaultConfig, type SecureSyncConfig } from './config.js';

export interface SecureSyncOptions {
  /** Overrides merged over {@link defaultConfig} */
  config?: Partial<SecureSyncConfig>;
  /** Remote backend (default: an offline backend that is never available) */
  backend?: SyncBackend;
  /** Local store whose writes are mirrored (default: nothing pending) */
  store?: PersistentStoreController;
  /** Key custody (default: files under `config.credentialDirectory`) */
  credentialStore?: CredentialStore;
  /** Opt-in persistence (default: JSON at `config.preferencesPath`) */
  intentStore?: UserIntentStore;
  /** Root logger (default: a ClipLogger at `config.logLevel`) */
  logger?: Logger;
  /** Seed state, e.g. from a previous session's snapshot */
  initialState?: SyncStatePatch;
  now?: () => number;
}

export interface SecureSync {
  readonly config: SecureSyncConfig;
  readonly bus: EventBus<SecureSyncEvent>;
  readonly encryption: EncryptionService;
  readonly state: SyncStateMachine;
  readonly orchestrator: SyncOrchestrator;
  readonly codec: SecureClipboardCodec;
  /** Wire backend signals and restore a previous opt-in */
  start(): Promise<SyncState>;
  /** Tear down the orchestrator, bus and encryption events */
  dispose(): Promise<void>;
}

const idleStore: PersistentStoreController = {
  hasPendingChanges: () => false,
  flush: async () => {},
};

function childLogger(logger: Logger, module: string): Logger {
  return logger instanceof ClipLogger ? logger.child(module) : logger;
}

/**
 * Build a wired secure-sync instance.
 *
 * @example
 * ```typescript
 * const secureSync = createSecureSync({
 *   config: loadSecureSyncConfig(),
 *   backend: myBackend,
 *   store: historyStore,
 * });
 *
 * secureSync.state.status$.subscribe(renderStatus);
 * await secureSync.start();
 * ```
 */
export function createSecureSync(options: SecureSyncOptions = {}): SecureSync {
  const config: SecureSyncConfig = { ...defaultConfig(), ...options.config };
  const logger = options.logger ?? createLogger({ module: 'clipkeep', level: config.logLevel });

  const bus = createEventBus<SecureSyncEvent>({ logger: childLogger(logger, 'events') });

  const encryption = new EncryptionService({
    store:
      options.credentialStore ??
      createFileCredentialStore({
        directory: config.credentialDirectory,
        logger: childLogger(logger, 'credentials'),
      }),
    logger: childLogger(logger, 'encryption'),
  });

  const state = new SyncStateMachine(options.initialState);

  const orchestrator = new SyncOrchestrator({
    state,
    encryption,
    intentStore:
      options.intentStore ??
      createFileUserIntentStore({
        filePath: config.preferencesPath,
        logger: childLogger(logger, 'preferences'),
      }),
    backend: options.backend ?? new OfflineSyncBackend(),
    store: options.store ?? idleStore,
    bus,
    appIdentity: config.appIdentity,
    propagationDelayMs: config.propagationDelayMs,
    probeTimeoutMs: config.probeTimeoutMs,
    accountTimeoutMs: config.accountTimeoutMs,
    syncTimeoutMs: config.syncTimeoutMs,
    logger: childLogger(logger, 'sync'),
    now: options.now,
  });

  const codec = new SecureClipboardCodec(encryption);

  return {
    config,
    bus,
    encryption,
    state,
    orchestrator,
    codec,
    start: () => orchestrator.start(),
    dispose: async () => {
      orchestrator.dispose();
      bus.destroy();
      await encryption.dispose();
    },
  };
}
