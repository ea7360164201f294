import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { ConfigurationError } from '../errors/app-error.js';

const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const CIPHER = 'aes-256-gcm';
const FORMAT_PREFIX = 'v1.';

export type VaultErrorCode = 'invalid_format' | 'decrypt_failed';

export type VaultResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: { code: VaultErrorCode; message: string } };

const ok = <T>(value: T): VaultResult<T> => ({ ok: true, value });

const err = <T>(code: VaultErrorCode, message: string): VaultResult<T> => ({
  ok: false,
  error: { code, message }
});

function decodeKey(encodedKey: string): Buffer {
  const trimmed = encodedKey.trim();
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(trimmed)) {
    throw new ConfigurationError('CREDENTIAL_ENCRYPTION_KEY must be base64 encoded.');
  }

  const decoded = Buffer.from(trimmed, trimmed.includes('-') || trimmed.includes('_') ? 'base64url' : 'base64');
  if (decoded.length !== KEY_BYTES) {
    throw new ConfigurationError(`CREDENTIAL_ENCRYPTION_KEY must decode to exactly ${KEY_BYTES} bytes.`);
  }

  return decoded;
}

/**
 * Symmetric encryption boundary for secrets stored at rest.
 *
 * Ciphertexts are `v1.` followed by base64url(iv || ciphertext || auth tag),
 * sealed with AES-256-GCM under a single process-wide key.
 */
export class CredentialVault {
  private constructor(private readonly key: Buffer) {}

  public static fromConfig(encodedKey: string | undefined): CredentialVault {
    if (encodedKey === undefined || encodedKey.trim().length === 0) {
      throw new ConfigurationError('CREDENTIAL_ENCRYPTION_KEY is not configured.');
    }

    return new CredentialVault(decodeKey(encodedKey));
  }

  public static generateKey(): string {
    return randomBytes(KEY_BYTES).toString('base64');
  }

  public encrypt(plaintext: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv(CIPHER, this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return `${FORMAT_PREFIX}${Buffer.concat([iv, ciphertext, tag]).toString('base64url')}`;
  }

  public decrypt(sealed: string): VaultResult<string> {
    if (!sealed.startsWith(FORMAT_PREFIX)) {
      return err('invalid_format', 'Ciphertext has an unknown format.');
    }

    const encoded = sealed.slice(FORMAT_PREFIX.length);
    if (!/^[A-Za-z0-9_-]*$/.test(encoded)) {
      return err('invalid_format', 'Ciphertext is not base64url.');
    }

    const payload = Buffer.from(encoded, 'base64url');
    if (payload.length < IV_BYTES + TAG_BYTES) {
      return err('invalid_format', 'Ciphertext is truncated.');
    }

    const iv = payload.subarray(0, IV_BYTES);
    const tag = payload.subarray(payload.length - TAG_BYTES);
    const ciphertext = payload.subarray(IV_BYTES, payload.length - TAG_BYTES);

    try {
      const decipher = createDecipheriv(CIPHER, this.key, iv);
      decipher.setAuthTag(tag);
      const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
      return ok(plaintext.toString('utf8'));
    } catch {
      return err('decrypt_failed', 'Ciphertext failed authentication.');
    }
  }
}
