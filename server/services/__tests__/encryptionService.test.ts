import { describe, it, expect, vi, afterEach } from 'vitest';
import { EncryptionService } from '../encryptionService';
import { CredentialDecryptionError } from '../errors';

const TEST_KEY = 'a'.repeat(64);

describe('Encryption Service', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should round-trip exchange credentials', () => {
    const vault = new EncryptionService(TEST_KEY);
    const encryptedKey = vault.encrypt('test-api-key');
    const encryptedSecret = vault.encrypt('test-secret');

    expect(encryptedKey.split(':')).toHaveLength(3);
    expect(vault.decrypt(encryptedKey, encryptedSecret)).toEqual({ apiKey: 'test-api-key', apiSecret: 'test-secret' });
  });

  it('should use a fresh IV for every value', () => {
    const vault = new EncryptionService(TEST_KEY);

    expect(vault.encrypt('same')).not.toBe(vault.encrypt('same'));
  });

  it('should reject tampered or malformed ciphertext', () => {
    const vault = new EncryptionService(TEST_KEY);
    const [iv, tag, cipher] = vault.encrypt('test-api-key').split(':');
    const flipped = (cipher.startsWith('0') ? '1' : '0') + cipher.slice(1);

    expect(() => vault.decryptValue(`${iv}:${tag}:${flipped}`)).toThrow(CredentialDecryptionError);
    expect(() => vault.decryptValue('not-encrypted')).toThrow('Invalid encrypted data format');
  });

  it('should refuse to decrypt with another key', () => {
    const encrypted = new EncryptionService(TEST_KEY).encrypt('test-api-key');

    expect(() => new EncryptionService('b'.repeat(64)).decryptValue(encrypted)).toThrow('Failed to decrypt data');
  });

  it('should report missing credentials', () => {
    const vault = new EncryptionService(TEST_KEY);

    expect(() => vault.decrypt(null, 'x')).toThrow('No exchange credentials stored');
  });

  it('should stay unconfigured without a key', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const vault = new EncryptionService(undefined);

    expect(vault.isConfigured()).toBe(false);
    expect(() => vault.decrypt('a:b:c', 'a:b:c')).toThrow('ENCRYPTION_KEY is not configured');
  });

  it('should reject keys that are not 64 hex characters', () => {
    expect(() => new EncryptionService('short')).toThrow('ENCRYPTION_KEY must be at least 64 hex characters');
    expect(() => new EncryptionService('z'.repeat(64))).toThrow('ENCRYPTION_KEY must be at least 64 hex characters');
  });
});
