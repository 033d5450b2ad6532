import crypto from 'crypto';
import { CredentialDecryptionError } from './errors';

const ALGORITHM = 'aes-256-gcm';

export interface ExchangeCredentials {
  apiKey: string;
  apiSecret: string;
}

/** Decrypts the exchange credentials stored on a user row. */
export interface CredentialVault {
  isConfigured(): boolean;
  decrypt(encryptedKey: string | null, encryptedSecret: string | null): ExchangeCredentials;
}

/**
 * AES-256-GCM vault. Stored values are `iv:authTag:ciphertext`, all hex.
 * The key is 64 hex characters (32 bytes); without one every decrypt fails.
 */
export class EncryptionService implements CredentialVault {
  private readonly key: Buffer | null;

  constructor(encryptionKey: string | undefined) {
    if (!encryptionKey) {
      console.error('[Encryption] ❌ ENCRYPTION_KEY is not set - stored exchange credentials cannot be decrypted');
      this.key = null;
      return;
    }
    if (!/^[0-9a-fA-F]{64,}$/.test(encryptionKey)) {
      throw new Error('ENCRYPTION_KEY must be at least 64 hex characters');
    }
    this.key = Buffer.from(encryptionKey.slice(0, 64), 'hex');
  }

  isConfigured(): boolean {
    return this.key !== null;
  }

  /**
   * Encrypts sensitive data using AES-256-GCM
   */
  encrypt(text: string): string {
    const key = this.requireKey();
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv(ALGORITHM, key, iv);

    let encrypted = cipher.update(text, 'utf8', 'hex');
    encrypted += cipher.final('hex');
    const authTag = cipher.getAuthTag();

    return `${iv.toString('hex')}:${authTag.toString('hex')}:${encrypted}`;
  }

  decryptValue(encryptedData: string): string {
    const key = this.requireKey();
    const parts = encryptedData.split(':');
    if (parts.length !== 3) {
      throw new CredentialDecryptionError('Invalid encrypted data format');
    }

    const [ivHex, authTagHex, encrypted] = parts;
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, key, Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

      let decrypted = decipher.update(encrypted, 'hex', 'utf8');
      decrypted += decipher.final('utf8');
      return decrypted;
    } catch (error) {
      throw new CredentialDecryptionError('Failed to decrypt data', error);
    }
  }

  decrypt(encryptedKey: string | null, encryptedSecret: string | null): ExchangeCredentials {
    if (!encryptedKey || !encryptedSecret) {
      throw new CredentialDecryptionError('No exchange credentials stored');
    }
    const apiKey = this.decryptValue(encryptedKey);
    const apiSecret = this.decryptValue(encryptedSecret);
    if (!apiKey || !apiSecret) {
      throw new CredentialDecryptionError('Decrypted exchange credentials are empty');
    }
    return { apiKey, apiSecret };
  }

  private requireKey(): Buffer {
    if (!this.key) {
      throw new CredentialDecryptionError('ENCRYPTION_KEY is not configured');
    }
    return this.key;
  }
}
