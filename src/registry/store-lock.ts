/**
 * Store lock
 *
 * One process at a time may change wallets.json. The lock is a pid file next
 * to the store, created with O_EXCL; a lock whose process is gone is taken
 * over.
 */

import * as fs from 'fs';
import { FarmhandError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('store');

export class StoreLockedError extends FarmhandError {
  constructor(
    public readonly lockFile: string,
    public readonly ownerPid: number | null
  ) {
    super(
      `Wallet store is in use by process ${ownerPid ?? 'unknown'} (${lockFile}). ` +
        'Stop that process first, or delete the lock file if it is not running.',
      'LOCKED'
    );
    this.name = 'StoreLockedError';
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: alive, owned by another user
    return hasCode(error, 'EPERM');
  }
}

export class StoreLock {
  private held = false;
  private readonly releaseOnExit = () => this.release();

  constructor(readonly lockFile: string) {}

  get isHeld(): boolean {
    return this.held;
  }

  acquire(): this {
    if (this.held) return this;

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        fs.writeFileSync(this.lockFile, `${process.pid}\n`, { flag: 'wx' });
        this.held = true;
        process.once('exit', this.releaseOnExit);
        return this;
      } catch (error) {
        if (!hasCode(error, 'EEXIST')) throw error;
      }

      const owner = this.readOwner();
      if (owner !== null && isProcessRunning(owner)) {
        throw new StoreLockedError(this.lockFile, owner);
      }
      log.warn('Removing stale store lock', { file: this.lockFile, pid: owner });
      fs.rmSync(this.lockFile, { force: true });
    }

    throw new StoreLockedError(this.lockFile, this.readOwner());
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    process.removeListener('exit', this.releaseOnExit);
    if (this.readOwner() === process.pid) {
      fs.rmSync(this.lockFile, { force: true });
    }
  }

  private readOwner(): number | null {
    try {
      const pid = Number.parseInt(fs.readFileSync(this.lockFile, 'utf-8').trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return null;
      throw error;
    }
  }
}
