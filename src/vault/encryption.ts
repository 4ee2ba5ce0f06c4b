/**
 * Vault encryption primitives
 * AES-256-GCM with a unique IV per entry, key derived from the operator
 * password with scrypt and a vault-wide salt.
 */

import crypto from 'crypto';
import { VaultHeader } from '../types';
import { AuthError } from '../utils/errors';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const CHECK_PLAINTEXT = 'farmhand-vault-check-v1';

export interface KdfParams {
  N: number;
  r: number;
  p: number;
}

export const DEFAULT_KDF: KdfParams = { N: 16384, r: 8, p: 1 };

export function deriveKey(password: string, saltHex: string, params: KdfParams): Buffer {
  return crypto.scryptSync(password, Buffer.from(saltHex, 'hex'), KEY_LENGTH, {
    N: params.N,
    r: params.r,
    p: params.p,
    maxmem: 256 * params.N * params.r * params.p,
  });
}

export class VaultCipher {
  constructor(private readonly key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new Error(`Vault key must be ${KEY_LENGTH} bytes`);
    }
  }

  /**
   * Encrypt to the combined iv:tag:ciphertext hex envelope
   */
  encrypt(text: string): string {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);

    let encrypted = cipher.update(text, 'utf8', 'hex');
    encrypted += cipher.final('hex');
    const tag = cipher.getAuthTag();

    return `${iv.toString('hex')}:${tag.toString('hex')}:${encrypted}`;
  }

  /**
   * Throws when the envelope is malformed or the key is wrong (GCM tag mismatch)
   */
  decrypt(envelope: string): string {
    const [iv, tag, encrypted] = envelope.split(':');
    if (!iv || !tag || encrypted === undefined) {
      throw new Error('Invalid encrypted data format');
    }

    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, Buffer.from(iv, 'hex'));
    decipher.setAuthTag(Buffer.from(tag, 'hex'));

    let decrypted = decipher.update(encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');
    return decrypted;
  }

  /** Overwrite the key bytes; the cipher is unusable afterwards */
  destroy(): void {
    this.key.fill(0);
  }
}

/**
 * Initialise a new vault header for password
 */
export function createVaultHeader(
  password: string,
  params: KdfParams = DEFAULT_KDF
): { header: VaultHeader; cipher: VaultCipher } {
  const salt = crypto.randomBytes(SALT_LENGTH).toString('hex');
  const cipher = new VaultCipher(deriveKey(password, salt, params));

  return {
    header: {
      version: 1,
      kdf: 'scrypt',
      salt,
      N: params.N,
      r: params.r,
      p: params.p,
      check: cipher.encrypt(CHECK_PLAINTEXT),
    },
    cipher,
  };
}

/**
 * Derive the key for an existing header and prove it against the check value
 */
export function openVault(header: VaultHeader, password: string): VaultCipher {
  const cipher = new VaultCipher(deriveKey(password, header.salt, header));

  let check: string;
  try {
    check = cipher.decrypt(header.check);
  } catch {
    cipher.destroy();
    throw new AuthError();
  }

  if (check !== CHECK_PLAINTEXT) {
    cipher.destroy();
    throw new AuthError();
  }
  return cipher;
}
