import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryCredentialStore } from '../credential-store.js';
import { fromBase64 } from '../crypto-utils.js';
import { EncryptionService } from '../encryption-service.js';
import { SecureClipboardCodec, createSecureClipboardCodec } from '../payload-codec.js';

describe('SecureClipboardCodec', () => {
  let encryption: EncryptionService;
  let codec: SecureClipboardCodec;

  beforeEach(() => {
    encryption = new EncryptionService({ store: new MemoryCredentialStore() });
    codec = createSecureClipboardCodec(encryption);
  });

  it('should store plain base64 while encryption is disabled', async () => {
    const stored = await codec.encode({ content: 'hi', imageData: new Uint8Array([1, 2]) });

    expect(stored).toEqual({ encryptedContent: 'aGk=', encryptedImageData: new Uint8Array([1, 2]) });
  });

  it('should only encode fields that are present', async () => {
    expect(await codec.encode({})).toEqual({});
    expect(await codec.encode({ content: 'text only' })).not.toHaveProperty('encryptedImageData');
  });

  it('should round-trip text and images once initialized', async () => {
    await encryption.initialize();
    const image = new Uint8Array([137, 80, 78, 71]);

    const stored = await codec.encode({ content: 'copied text', imageData: image });

    expect(fromBase64(stored.encryptedContent ?? '')).toHaveLength(12 + 11 + 16);
    expect(stored.encryptedImageData).toHaveLength(12 + 4 + 16);
    expect(await codec.decode(stored)).toEqual({ content: 'copied text', imageData: image });
  });

  it('should read records written before encryption was enabled', async () => {
    const legacy = await codec.encode({ content: 'old entry' });
    await encryption.initialize();

    expect(await codec.decode(legacy)).toEqual({ content: 'old entry' });
  });

  it('should drop content that cannot be read as text', async () => {
    expect(await codec.decode({ encryptedContent: '%%%' })).toEqual({});
  });
});
