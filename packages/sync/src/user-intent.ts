/**
 * Persistence of the user's sync opt-in.
 *
 * The flag lives under {@link SYNC_INTENT_PREFERENCE_KEY} in a JSON preferences
 * file shared with other settings; writes keep the other keys intact.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { StoreError, noopLogger, type Logger } from '@clipkeep/core';
import type { UserIntentStore } from './types.js';

export const SYNC_INTENT_PREFERENCE_KEY = 'CloudKitSyncEnabled';

const preferencesSchema = z
  .object({
    [SYNC_INTENT_PREFERENCE_KEY]: z.boolean().optional(),
  })
  .passthrough();

type Preferences = z.infer<typeof preferencesSchema>;

// ── MemoryUserIntentStore ─────────────────────────────────

export class MemoryUserIntentStore implements UserIntentStore {
  private value: boolean;
  private writes = 0;

  constructor(initial = false) {
    this.value = initial;
  }

  async load(): Promise<boolean> {
    return this.value;
  }

  /** Saves run one at a time, in call order */
  save(wantsSync: boolean): Promise<void> {
    const run = this.writes.then(() => this.writePreferences(wantsSync));
    this.writes = run.then(
      () => undefined,
      (error: unknown) => {
        this.logger.debug('Queued preferences write failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    );
    return run;
  }

  private async writePreferences(wantsSync: boolean): Promise<void> {
    const preferences = await this.readPreferences();
    const next: Preferences = { ...preferences, [SYNC_INTENT_PREFERENCE_KEY]: wantsSync };
    const tmpPath = `${this.filePath}.${process.pid}.${++this.tmpCounter}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(next, null, 2)}\n`, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new StoreError(
        'CLIP_S301',
        `Failed to save preferences: ${cause.message}`,
        { filePath: this.filePath },
        cause
      );
    }
  }

  private async readPreferences(): Promise<Preferences> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.warn('Preferences file unreadable', {
          filePath: this.filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return {};
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Preferences file is not valid JSON', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    const parsed = preferencesSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn('Preferences file failed validation', {
        filePath: this.filePath,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return {};
    }
    return parsed.data;
  }
}

export function createFileUserIntentStore(config: FileUserIntentStoreConfig): FileUserIntentStore {
  return new FileUserIntentStore(config);
}
