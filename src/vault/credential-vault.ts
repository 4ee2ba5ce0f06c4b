/**
 * Credential Vault
 *
 * Owns every private key. Keys are stored sealed in the wallet registry
 * (AES-256-GCM envelope, or plaintext base58 when encryption is switched off)
 * and only leave the vault inside a withSigner scope.
 */

import { Keypair } from '@solana/web3.js';
import { WalletRegistry } from '../registry/wallet-registry';
import { AuthError, toError } from '../utils/errors';
import { parseProxy, readLines, removeLines } from '../utils/files';
import { createLogger } from '../utils/logger';
import { DEFAULT_KDF, KdfParams, VaultCipher, createVaultHeader, openVault } from './encryption';
import { ParsedKey, keypairFromSecret, parseSecretKey } from './key-import';

const log = createLogger('vault');

export interface CredentialVaultOptions {
  /** private_key_encryption */
  encryption: boolean;
  kdf?: KdfParams;
}

export interface ImportSource {
  keysFile: string;
  /** Line N holds the proxy of wallet index N */
  proxiesFile?: string;
}

export interface ImportReport {
  imported: number;
  duplicates: number;
  invalid: number;
}

/**
 * An unlocked vault. Holds the derived key until lock().
 */
export class VaultHandle {
  constructor(
    private readonly registry: WalletRegistry,
    private cipher: VaultCipher | null,
    private readonly encryption: boolean
  ) {}

  get encrypted(): boolean {
    return this.encryption;
  }

  /**
   * Plaintext secret for one wallet. Never persist the result.
   */
  decrypt(walletId: number): string {
    const record = this.registry.get(walletId);
    if (!record.encrypted) {
      return record.secret;
    }
    if (!this.cipher) {
      throw new AuthError(`Vault is locked, cannot decrypt wallet ${walletId}`);
    }
    try {
      return this.cipher.decrypt(record.secret);
    } catch (error) {
      throw new AuthError(`Cannot decrypt credential for wallet ${walletId}: ${toError(error).message}`);
    }
  }

  /**
   * Run fn with the wallet's keypair; the decoded key bytes are zeroed when
   * fn settles, whatever the outcome.
   */
  async withSigner<T>(walletId: number, fn: (signer: Keypair) => Promise<T>): Promise<T> {
    const { keypair, bytes } = keypairFromSecret(this.decrypt(walletId));
    try {
      return await fn(keypair);
    } finally {
      bytes.fill(0);
    }
  }

  /**
   * Seal a plaintext secret for storage
   */
  encrypt(plaintext: string): { secret: string; encrypted: boolean } {
    if (!this.encryption) {
      return { secret: plaintext, encrypted: false };
    }
    if (!this.cipher) {
      throw new AuthError('Vault is locked');
    }
    return { secret: this.cipher.encrypt(plaintext), encrypted: true };
  }

  /**
   * Ingest private_keys.txt. Every processed line (imported, duplicate or
   * invalid) is removed from the file, so a second run imports nothing.
   */
  importPlaintextKeys(source: ImportSource): ImportReport {
    const report: ImportReport = { imported: 0, duplicates: 0, invalid: 0 };
    const lines = readLines(source.keysFile);
    const proxies = source.proxiesFile ? readLines(source.proxiesFile) : [];
    const processed: string[] = [];

    lines.forEach((line, index) => {
      processed.push(line);

      let parsed: ParsedKey;
      try {
        parsed = parseSecretKey(line);
      } catch (error) {
        report.invalid++;
        log.warn('Skipping invalid key line', { line: index + 1, reason: toError(error).message });
        return;
      }

      if (this.registry.findByAddress(parsed.address)) {
        report.duplicates++;
        log.debug('Wallet already imported', { address: parsed.address });
        return;
      }

      const id = this.registry.nextId();
      const proxyLine = proxies[id - 1];
      const proxy = proxyLine ? parseProxy(proxyLine) : null;
      if (proxyLine && !proxy) {
        log.warn('Invalid proxy line ignored', { line: id });
      }

      const record = this.registry.add({ address: parsed.address, proxy, ...this.encrypt(parsed.secret) });
      if (record) {
        report.imported++;
        log.info(`${this.registry.tag(record)} Imported`);
      }
    });

    if (processed.length > 0) {
      removeLines(source.keysFile, processed);
    }
    log.info('Import finished', { ...report });
    return report;
  }

  lock(): void {
    this.cipher?.destroy();
    this.cipher = null;
  }
}

export class CredentialVault {
  private readonly kdf: KdfParams;

  constructor(
    private readonly registry: WalletRegistry,
    private readonly options: CredentialVaultOptions
  ) {
    this.kdf = options.kdf ?? DEFAULT_KDF;
  }

  /** True when unlocking needs a password */
  requiresPassword(): boolean {
    return this.options.encryption || this.registry.getVaultHeader() !== null;
  }

  /**
   * Derive the key and prove it against the stored check value. The first
   * unlock of a vault without a header creates one for this password.
   */
  unlock(password?: string): VaultHandle {
    const header = this.registry.getVaultHeader();

    if (!header && !this.options.encryption) {
      return new VaultHandle(this.registry, null, false);
    }
    if (!password) {
      throw new AuthError('Vault password required');
    }

    if (header) {
      const cipher = openVault(header, password);
      log.info('Vault unlocked');
      return new VaultHandle(this.registry, cipher, this.options.encryption);
    }

    const created = createVaultHeader(password, this.kdf);
    this.registry.setVaultHeader(created.header);
    log.info('Vault initialised');
    return new VaultHandle(this.registry, created.cipher, true);
  }

  /**
   * Re-encrypt every entry under a new password in a single store write
   */
  rekey(oldPassword: string, newPassword: string): number {
    const current = this.unlock(oldPassword);
    const next = createVaultHeader(newPassword, this.kdf);
    let count = 0;

    try {
      this.registry.rewriteSecrets((record) => {
        count++;
        return { secret: next.cipher.encrypt(current.decrypt(record.id)), encrypted: true };
      }, next.header);
    } finally {
      current.lock();
      next.cipher.destroy();
    }

    log.info('Vault re-keyed', { wallets: count });
    return count;
  }

  /**
   * Encrypt plaintext entries in place after encryption has been switched on
   */
  encryptExisting(password: string): number {
    const handle = new CredentialVault(this.registry, { ...this.options, encryption: true }).unlock(password);
    let count = 0;

    try {
      this.registry.rewriteSecrets((record) => {
        if (record.encrypted) {
          return { secret: record.secret, encrypted: true };
        }
        count++;
        return handle.encrypt(record.secret);
      }, null);
    } finally {
      handle.lock();
    }

    log.info('Plaintext keys encrypted', { wallets: count });
    return count;
  }
}
