/**
 * clipkeep - encrypted clipboard history with multi-device sync
 *
 * Re-exports the core, encryption and sync packages and adds the
 * configuration loader and the composition root.
 *
 * @example
 * ```typescript
 * import { createSecureSync, loadSecureSyncConfig } from 'clipkeep';
 *
 * const secureSync = createSecureSync({ config: loadSecureSyncConfig() });
 * await secureSync.start();
 *
 * const result = await secureSync.orchestrator.enable();
 * if (!result.enabled) {
 *   console.log(result.reason);
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from '@clipkeep/core';
export * from '@clipkeep/encryption';
export * from '@clipkeep/sync';

export {
  APP_IDENTITY_ENV,
  CONFIG_FILE,
  defaultConfig,
  findConfigFile,
  loadSecureSyncConfig,
  parseConfigFile,
  type LoadConfigOptions,
  type SecureSyncConfig,
  type SecureSyncConfigFile,
} from './config.js';
export { getDeviceInfo } from './device-info.js';
export { createSecureSync, type SecureSync, type SecureSyncOptions } from './secure-sync.js';
