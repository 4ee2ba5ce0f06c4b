/**
 * Secret key parsing
 *
 * Accepted encodings, one per line of private_keys.txt:
 * - base58 64-byte secret key (wallet export format)
 * - base58 32-byte seed
 * - JSON byte array (solana-keygen format)
 * - 128 hex characters, optional 0x prefix
 *
 * Everything is normalised to the base58 64-byte form.
 */

import { Keypair } from '@solana/web3.js';
import bs58 from 'bs58';

export class InvalidKeyError extends Error {
  constructor(reason: string) {
    super(`Invalid private key: ${reason}`);
    this.name = 'InvalidKeyError';
  }
}

export interface ParsedKey {
  /** base58 of the 64-byte secret key */
  secret: string;
  address: string;
}

function decodeBytes(value: string): Uint8Array {
  if (value.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      throw new InvalidKeyError('malformed JSON byte array');
    }
    if (
      !Array.isArray(parsed) ||
      !parsed.every((b): b is number => Number.isInteger(b) && b >= 0 && b <= 255)
    ) {
      throw new InvalidKeyError('JSON array must hold bytes');
    }
    return Uint8Array.from(parsed);
  }

  const hex = value.replace(/^0x/i, '');
  if (/^[0-9a-fA-F]{128}$/.test(hex)) {
    return Uint8Array.from(Buffer.from(hex, 'hex'));
  }

  try {
    return bs58.decode(value);
  } catch {
    throw new InvalidKeyError('not base58, hex or a JSON byte array');
  }
}

function toKeypair(bytes: Uint8Array): Keypair {
  if (bytes.length === 32) {
    return Keypair.fromSeed(bytes);
  }
  if (bytes.length !== 64) {
    throw new InvalidKeyError(`expected 32 or 64 bytes, got ${bytes.length}`);
  }
  try {
    return Keypair.fromSecretKey(bytes);
  } catch {
    throw new InvalidKeyError('public half does not match the secret');
  }
}

export function parseSecretKey(line: string): ParsedKey {
  const bytes = decodeBytes(line.trim());
  try {
    const keypair = toKeypair(bytes);
    return {
      secret: bs58.encode(keypair.secretKey),
      address: keypair.publicKey.toBase58(),
    };
  } finally {
    bytes.fill(0);
  }
}

/**
 * Keypair for a normalised secret. The caller owns the returned bytes.
 */
export function keypairFromSecret(secret: string): { keypair: Keypair; bytes: Uint8Array } {
  const bytes = bs58.decode(secret);
  return { keypair: toKeypair(bytes), bytes };
}
