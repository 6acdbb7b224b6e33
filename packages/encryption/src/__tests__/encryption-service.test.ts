import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ENCRYPTION_KEY_IDENTIFIER, MemoryCredentialStore } from '../credential-store.js';
import { stringToBytes, toBase64 } from '../crypto-utils.js';
import { EncryptionService, createEncryptionService } from '../encryption-service.js';
import type { EncryptionEvent } from '../types.js';

async function fingerprintOf(material: Uint8Array): Promise<string> {
  const digest = await globalThis.crypto.subtle.digest('SHA-256', new Uint8Array(material));
  return Buffer.from(digest).toString('hex').slice(0, 16);
}

describe('EncryptionService', () => {
  let store: MemoryCredentialStore;
  let service: EncryptionService;
  let events: EncryptionEvent[];

  beforeEach(() => {
    store = new MemoryCredentialStore();
    service = createEncryptionService({ store });
    events = [];
    service.events$.subscribe((event) => events.push(event));
  });

  afterEach(async () => {
    await service.dispose();
  });

  describe('before initialize', () => {
    it('should not touch the store on construction', () => {
      const spy = vi.spyOn(store, 'load');
      createEncryptionService({ store });
      expect(spy).not.toHaveBeenCalled();
    });

    it('should be disabled', () => {
      expect(service.isEnabled).toBe(false);
      expect(service.keyFingerprint).toBeNull();
    });

    it('should pass bytes through unchanged', async () => {
      const bytes = new Uint8Array([1, 2, 3]);
      expect(await service.encrypt(bytes)).toBe(bytes);
      expect(await service.decrypt(bytes)).toBe(bytes);
    });

    it('should encode strings as plain base64', async () => {
      expect(await service.encryptString('hi')).toBe('aGk=');
      expect(await service.decryptString('aGk=')).toBe('hi');
    });
  });

  describe('initialize', () => {
    it('should generate and persist a 32-byte key', async () => {
      await service.initialize();

      const stored = await store.load(ENCRYPTION_KEY_IDENTIFIER);
      expect(stored).toHaveLength(32);
      expect(service.isEnabled).toBe(true);
      expect(service.keyFingerprint).toBe(await fingerprintOf(stored ?? new Uint8Array(0)));
      expect(events.map((e) => e.type)).toEqual(['key:generated']);
    });

    it('should be idempotent', async () => {
      const save = vi.spyOn(store, 'save');

      await service.initialize();
      const fingerprint = service.keyFingerprint;
      await service.initialize();

      expect(save).toHaveBeenCalledTimes(1);
      expect(service.keyFingerprint).toBe(fingerprint);
    });

    it('should adopt a previously stored key', async () => {
      const material = new Uint8Array(32).fill(7);
      await store.save(ENCRYPTION_KEY_IDENTIFIER, material);
      const save = vi.spyOn(store, 'save');

      await service.initialize();

      expect(save).not.toHaveBeenCalled();
      expect(service.keyFingerprint).toBe(await fingerprintOf(material));
      expect(events[0]?.type).toBe('key:loaded');
    });

    it('should replace a stored entry of the wrong length', async () => {
      await store.save(ENCRYPTION_KEY_IDENTIFIER, new Uint8Array(16));

      await service.initialize();

      expect(await store.load(ENCRYPTION_KEY_IDENTIFIER)).toHaveLength(32);
      expect(events.map((e) => e.type)).toEqual(['key:generated']);
    });

    it('should keep a session-only key when persisting fails', async () => {
      store.simulateFailure({ writes: true });

      await service.initialize();

      expect(service.isEnabled).toBe(true);
      expect(store.size).toBe(0);
      expect(events.map((e) => e.type)).toEqual(['key:persist-failed', 'key:generated']);
      expect(events[0]?.error?.message).toBe('Failed to write to secure storage');

      const sealed = await service.encryptString('session only');
      expect(await service.decryptString(sealed)).toBe('session only');
    });

    it('should serialize concurrent calls', async () => {
      const save = vi.spyOn(store, 'save');

      const [, , sealed] = await Promise.all([
        service.initialize(),
        service.initialize(),
        service.encryptString('racing'),
      ]);

      expect(save).toHaveBeenCalledTimes(1);
      expect(sealed).not.toBe(toBase64(stringToBytes('racing')));
      expect(await service.decryptString(sealed)).toBe('racing');
    });
  });

  describe('encrypt / decrypt', () => {
    beforeEach(async () => {
      await service.initialize();
      events = [];
    });

    it('should round-trip text', async () => {
      const text = 'Clipboard entry: 密码 🔐';
      const sealed = await service.encryptString(text);

      expect(sealed).not.toBe(toBase64(stringToBytes(text)));
      expect(await service.decryptString(sealed)).toBe(text);
    });

    it('should round-trip images', async () => {
      const image = new Uint8Array(256).map((_, i) => i);
      const sealed = await service.encryptImage(image);

      expect(sealed).toHaveLength(12 + 256 + 16);
      expect(await service.decryptImage(sealed)).toEqual(image);
    });

    it('should open payloads with a key restored from the store', async () => {
      const sealed = await service.encryptString('survives restart');

      const restarted = createEncryptionService({ store });
      await restarted.initialize();

      expect(restarted.keyFingerprint).toBe(service.keyFingerprint);
      expect(await restarted.decryptString(sealed)).toBe('survives restart');
      await restarted.dispose();
    });

    it('should return legacy plaintext unchanged', async () => {
      expect(await service.decryptString(toBase64(stringToBytes('legacy')))).toBe('legacy');
    });

    it('should return malformed input unchanged and report the fallback', async () => {
      const bytes = new Uint8Array([1, 2, 3]);

      expect(await service.decrypt(bytes)).toBe(bytes);
      expect(events).toHaveLength(1);
      expect(events[0]?.type).toBe('crypto:fallback');
      expect(events[0]?.keyId).toBe(service.keyFingerprint);
    });

    it('should return tampered blobs unchanged', async () => {
      const sealed = await service.encrypt(stringToBytes('secret'));
      sealed[20] = (sealed[20] ?? 0) ^ 0x01;

      expect(await service.decrypt(sealed)).toBe(sealed);
    });

    it('should return null for input that is not base64', async () => {
      expect(await service.decryptString('not base64!')).toBeNull();
    });

    it('should return null when the opened bytes are not UTF-8', async () => {
      expect(await service.decryptString(toBase64(new Uint8Array([0xff, 0xfe])))).toBeNull();
    });
  });

  describe('disable', () => {
    it('should drop the key but keep the stored copy', async () => {
      await service.initialize();
      const fingerprint = service.keyFingerprint;

      await service.disable();

      expect(service.isEnabled).toBe(false);
      expect(store.has(ENCRYPTION_KEY_IDENTIFIER)).toBe(true);
      expect(await service.encryptString('hi')).toBe('aGk=');

      await service.initialize();
      expect(service.keyFingerprint).toBe(fingerprint);
      expect(events.map((e) => e.type)).toEqual(['key:generated', 'key:dropped', 'key:loaded']);
    });

    it('should be a no-op when uninitialized', async () => {
      await service.disable();
      expect(service.isEnabled).toBe(false);
      expect(events).toEqual([]);
    });
  });

  describe('destroyKey', () => {
    it('should delete the stored key', async () => {
      await service.initialize();
      const sealed = await service.encryptString('gone');
      const fingerprint = service.keyFingerprint;

      await service.destroyKey();

      expect(service.isEnabled).toBe(false);
      expect(store.has(ENCRYPTION_KEY_IDENTIFIER)).toBe(false);
      expect(events.at(-1)?.type).toBe('key:destroyed');

      await service.initialize();
      expect(service.keyFingerprint).not.toBe(fingerprint);
      expect(await service.decryptString(sealed)).not.toBe('gone');
    });
  });

  it('should complete the event stream on dispose', async () => {
    const complete = vi.fn();
    const other = createEncryptionService({ store });
    other.events$.subscribe({ complete });

    await other.dispose();

    expect(complete).toHaveBeenCalledTimes(1);
  });
});
