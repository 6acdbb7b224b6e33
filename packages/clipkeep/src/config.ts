/**
 * clipkeep - Configuration Loader
 *
 * Discovers `clipkeep.config.json`, validates it and merges it over defaults.
 *
 * @module clipkeep/config
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@clipkeep/core';

/**
 * Configuration file name searched for from the working directory upward
 */
export const CONFIG_FILE = 'clipkeep.config.json';

/**
 * Environment variable that overrides `appIdentity`
 */
export const APP_IDENTITY_ENV = 'CLIPKEEP_APP_IDENTITY';

const configFileSchema = z
  .object({
    appIdentity: z.string().min(1).nullable().optional(),
    credentialDirectory: z.string().min(1).optional(),
    preferencesPath: z.string().min(1).optional(),
    propagationDelayMs: z.number().int().nonnegative().optional(),
    probeTimeoutMs: z.number().int().positive().optional(),
    accountTimeoutMs: z.number().int().positive().optional(),
    syncTimeoutMs: z.number().int().positive().optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

export type SecureSyncConfigFile = z.infer<typeof configFileSchema>;

/**
 * Resolved configuration
 */
export interface SecureSyncConfig {
  /** Identity the application was packaged with; null when unpackaged */
  appIdentity: string | null;
  /** Device-local directory for credential entries */
  credentialDirectory: string;
  /** JSON preferences file holding the sync opt-in */
  preferencesPath: string;
  propagationDelayMs: number;
  probeTimeoutMs: number;
  accountTimeoutMs: number;
  syncTimeoutMs: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Default configuration values
 */
export function defaultConfig(homeDir: string = os.homedir()): SecureSyncConfig {
  const base = path.join(homeDir, '.clipkeep');
  return {
    appIdentity: null,
    credentialDirectory: path.join(base, 'credentials'),
    preferencesPath: path.join(base, 'preferences.json'),
    propagationDelayMs: 1000,
    probeTimeoutMs: 10_000,
    accountTimeoutMs: 10_000,
    syncTimeoutMs: 30_000,
    logLevel: 'info',
  };
}

/**
 * Find a configuration file in the given directory or its parents
 *
 * @returns Path to the config file, or null if not found
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE);
    if (fs.existsSync(configPath)) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Parse and validate the contents of a configuration file
 */
export function parseConfigFile(contents: string, source: string): SecureSyncConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(
      `Config file ${source} is not valid JSON`,
      { source },
      error instanceof Error ? error : undefined
    );
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid config file ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path; skips discovery */
  configPath?: string;
  /** Directory discovery starts from (default: process.cwd()) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Home directory used for default paths (default: os.homedir()) */
  homeDir?: string;
}

/**
 * Load configuration: defaults, then the config file, then the environment.
 * Relative paths in the file resolve against the file's directory.
 */
export function loadSecureSyncConfig(options: LoadConfigOptions = {}): SecureSyncConfig {
  const env = options.env ?? process.env;
  const config = defaultConfig(options.homeDir);

  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : findConfigFile(options.cwd);

  if (configPath) {
    let contents: string;
    try {
      contents = fs.readFileSync(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(
        `Failed to read config from ${configPath}`,
        { configPath },
        error instanceof Error ? error : undefined
      );
    }

    const file = parseConfigFile(contents, configPath);
    const baseDir = path.dirname(configPath);

    Object.assign(config, {
      ...(file.appIdentity !== undefined ? { appIdentity: file.appIdentity } : {}),
      ...(file.credentialDirectory
        ? { credentialDirectory: path.resolve(baseDir, file.credentialDirectory) }
        : {}),
      ...(file.preferencesPath ? { preferencesPath: path.resolve(baseDir, file.preferencesPath) } : {}),
      ...(file.propagationDelayMs !== undefined ? { propagationDelayMs: file.propagationDelayMs } : {}),
      ...(file.probeTimeoutMs !== undefined ? { probeTimeoutMs: file.probeTimeoutMs } : {}),
      ...(file.accountTimeoutMs !== undefined ? { accountTimeoutMs: file.accountTimeoutMs } : {}),
      ...(file.syncTimeoutMs !== undefined ? { syncTimeoutMs: file.syncTimeoutMs } : {}),
      ...(file.logLevel ? { logLevel: file.logLevel } : {}),
    });
  }

  const envIdentity = env[APP_IDENTITY_ENV]?.trim();
  if (envIdentity) {
    config.appIdentity = envIdentity;
  }

  return config;
}
