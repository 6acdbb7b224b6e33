import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLogger, type LogEntry } from '@clipkeep/core';
import {
  FileUserIntentStore,
  MemoryUserIntentStore,
  SYNC_INTENT_PREFERENCE_KEY,
  createFileUserIntentStore,
} from '../user-intent.js';

describe('MemoryUserIntentStore', () => {
  it('should default to opted out', async () => {
    expect(await new MemoryUserIntentStore().load()).toBe(false);
  });

  it('should remember the last save', async () => {
    const store = new MemoryUserIntentStore();

    await store.save(true);
    expect(await store.load()).toBe(true);
    await store.save(false);
    expect(await store.load()).toBe(false);
    expect(store.saveCount).toBe(2);
  });
});

describe('FileUserIntentStore', () => {
  let dir: string;
  let filePath: string;
  let entries: LogEntry[];
  let store: FileUserIntentStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'clipkeep-preferences-'));
    filePath = path.join(dir, 'prefs', 'preferences.json');
    entries = [];
    store = createFileUserIntentStore({
      filePath,
      logger: createLogger({ handler: (e) => entries.push(e) }),
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should read a missing file as opted out without warning', async () => {
    expect(await store.load()).toBe(false);
    expect(entries).toEqual([]);
  });

  it('should persist the flag under its preference key', async () => {
    await store.save(true);

    expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual({
      [SYNC_INTENT_PREFERENCE_KEY]: true,
    });
    expect(await store.load()).toBe(true);
  });

  it('should survive a new instance', async () => {
    await store.save(true);
    expect(await createFileUserIntentStore({ filePath }).load()).toBe(true);
  });

  it('should keep unrelated preferences', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ historyLimit: 500 }));

    await store.save(false);

    expect(JSON.parse(await fs.readFile(filePath, 'utf-8'))).toEqual({
      historyLimit: 500,
      CloudKitSyncEnabled: false,
    });
  });

  it('should apply overlapping saves in call order', async () => {
    const results = await Promise.allSettled([
      store.save(true),
      store.save(false),
      store.save(true),
      store.save(false),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'fulfilled', 'fulfilled', 'fulfilled']);
    expect(await store.load()).toBe(false);
    expect(await fs.readdir(path.dirname(filePath))).toEqual(['preferences.json']);
  });

  it('should keep saving after a failed write', async () => {
    const blocker = path.join(dir, 'late');
    await fs.writeFile(blocker, 'file, not directory');
    const lateStore = createFileUserIntentStore({ filePath: path.join(blocker, 'preferences.json') });

    await expect(lateStore.save(true)).rejects.toMatchObject({ code: 'CLIP_S301' });
    await fs.rm(blocker);
    await lateStore.save(false);

    expect(JSON.parse(await fs.readFile(path.join(blocker, 'preferences.json'), 'utf-8'))).toEqual({
      CloudKitSyncEnabled: false,
    });
  });

  it('should read invalid JSON as opted out', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '{not json');

    expect(await store.load()).toBe(false);
    expect(entries.map((e) => e.message)).toEqual(['Preferences file is not valid JSON']);
  });

  it('should read a non-boolean flag as opted out', async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ CloudKitSyncEnabled: 'yes' }));

    expect(await store.load()).toBe(false);
    expect(entries.map((e) => e.message)).toEqual(['Preferences file failed validation']);
  });

  it('should raise a StoreError when the file cannot be written', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'file, not directory');
    const blocked = createFileUserIntentStore({ filePath: path.join(blocker, 'preferences.json') });

    await expect(blocked.save(true)).rejects.toMatchObject({
      name: 'StoreError',
      code: 'CLIP_S301',
    });
  });
});
