/**
 * Wallet Registry
 *
 * Catalog of wallets and their run state on top of the durable WalletStore.
 *
 * State machine per wallet:
 *   idle -> running -> completed -> cooling-down -> idle
 *                   -> failed    -> idle (with retry backoff)
 *   disabled: reached and left only through explicit operator calls
 */

import { Bounds, WalletSelection } from '../config';
import { RunState, SocialHandles, VaultHeader, WalletRecord, WalletView } from '../types';
import { Clock, systemClock } from '../utils/clock';
import { NotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { RandomSource, mathRandom, randomInt } from '../utils/random';
import { isSelected } from './selection';
import { StoreLock } from './store-lock';
import { WalletStore } from './wallet-store';

const log = createLogger('registry');

export const PROJECT_SHORT_NAME = 'farmhand';

/**
 * Exponential backoff after a failed wallet run: base * 2^(failures - 1), capped
 */
export interface RetryPolicy {
  baseDelaySeconds: number;
  maxDelaySeconds: number;
}

export interface NewWallet {
  address: string;
  secret: string;
  encrypted: boolean;
  proxy?: string | null;
  socials?: SocialHandles;
}

export interface MetadataEntry {
  /** Match by address, or by wallet index when the address is absent */
  address?: string;
  id?: number;
  proxy?: string | null;
  twitter?: string;
  discord?: string;
}

export interface SyncReport {
  updated: number;
  unchanged: number;
  unknown: string[];
}

export class InvalidTransitionError extends Error {
  constructor(id: number, from: RunState, to: string) {
    super(`Wallet ${id}: cannot go from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export interface OpenOptions {
  clock?: Clock;
  random?: RandomSource;
  showAddressInLogs?: boolean;
  /** Hold the store lock until close(); required for every process that writes */
  exclusive?: boolean;
}

export class WalletRegistry {
  private lock: StoreLock | null = null;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly showAddress: boolean;

  constructor(
    private readonly store: WalletStore,
    options: { clock?: Clock; random?: RandomSource; showAddressInLogs?: boolean } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? mathRandom;
    this.showAddress = options.showAddressInLogs ?? true;
  }

  /**
   * Load the store from filePath and reset wallets a crashed run left running.
   * With `exclusive`, fails with StoreLockedError while another process holds
   * the store.
   */
  static open(filePath: string | null, options: OpenOptions = {}): WalletRegistry {
    const lock = options.exclusive && filePath ? new StoreLock(`${filePath}.lock`).acquire() : null;

    try {
      const registry = new WalletRegistry(new WalletStore(filePath).load(), options);
      registry.lock = lock;
      if (lock) {
        const recovered = registry.recoverInterrupted();
        if (recovered > 0) {
          log.warn(`Recovered ${recovered} wallet(s) left running by a previous process`);
        }
      }
      return registry;
    } catch (error) {
      lock?.release();
      throw error;
    }
  }

  /** Release the store lock, if held */
  close(): void {
    this.lock?.release();
    this.lock = null;
  }

  get size(): number {
    return this.store.size;
  }

  list(): WalletRecord[] {
    return this.store.list();
  }

  get(id: number): WalletRecord {
    const record = this.store.getById(id);
    if (!record) {
      throw new NotFoundError('wallet', id);
    }
    return record;
  }

  /** Index the next added wallet will get */
  nextId(): number {
    return this.store.nextId();
  }

  findByAddress(address: string): WalletRecord | undefined {
    return this.store.getByAddress(address);
  }

  tag(record: Pick<WalletRecord, 'id' | 'address'>): string {
    return this.showAddress
      ? `[${PROJECT_SHORT_NAME} | ${record.id} | ${record.address}]`
      : `[${PROJECT_SHORT_NAME} | ${record.id}]`;
  }

  view(record: WalletRecord): WalletView {
    return Object.freeze({
      id: record.id,
      address: record.address,
      proxy: record.proxy,
      referralCode: record.referralCode,
      socials: Object.freeze({ ...record.socials }),
      tag: this.tag(record),
    });
  }

  /**
   * Insert a new wallet. Returns null when the address is already known.
   */
  add(input: NewWallet): WalletRecord | null {
    if (this.store.getByAddress(input.address)) {
      return null;
    }

    const now = this.clock.now();
    const record: WalletRecord = {
      id: this.store.nextId(),
      address: input.address,
      secret: input.secret,
      encrypted: input.encrypted,
      proxy: input.proxy ?? null,
      socials: { ...input.socials },
      referralCode: null,
      inviteCode: null,
      points: 0,
      state: 'idle',
      lastCompletedAt: null,
      nextEligibleAt: null,
      failureCount: 0,
      lastError: null,
      createdAt: now,
      updatedAt: now,
    };
    this.store.insert(record);
    return record;
  }

  // ==========================================================================
  // Selection
  // ==========================================================================

  selected(selection: WalletSelection): WalletRecord[] {
    return this.store.list().filter((w) => isSelected(w.id, selection));
  }

  /**
   * Selected wallets that may start now, in insertion order
   */
  eligibleWallets(selection: WalletSelection, now: number = this.clock.now()): WalletRecord[] {
    return this.selected(selection).filter(
      (w) =>
        w.state !== 'disabled' &&
        w.state !== 'running' &&
        (w.nextEligibleAt === null || w.nextEligibleAt <= now)
    );
  }

  /**
   * Earliest time a selected, not yet eligible wallet becomes eligible.
   * Null when no selected wallet is waiting on a timestamp.
   */
  nextWakeTime(selection: WalletSelection, now: number = this.clock.now()): number | null {
    let earliest: number | null = null;
    for (const w of this.selected(selection)) {
      if (w.state === 'disabled' || w.state === 'running') continue;
      if (w.nextEligibleAt === null || w.nextEligibleAt <= now) continue;
      if (earliest === null || w.nextEligibleAt < earliest) {
        earliest = w.nextEligibleAt;
      }
    }
    return earliest;
  }

  /**
   * True while some selected wallet is not disabled
   */
  hasRunnable(selection: WalletSelection): boolean {
    return this.selected(selection).some((w) => w.state !== 'disabled');
  }

  // ==========================================================================
  // Run state transitions
  // ==========================================================================

  markRunning(id: number): WalletRecord {
    return this.transition(id, (w) => {
      if (w.state !== 'idle' && w.state !== 'cooling-down') {
        throw new InvalidTransitionError(id, w.state, 'running');
      }
      w.state = 'running';
    });
  }

  /**
   * Completed: cooling down until now + uniform(min, max) seconds
   */
  markCompleted(id: number, cooldown: Bounds): WalletRecord {
    return this.transition(id, (w, now) => {
      this.assertRunning(w, 'completed');
      const delaySeconds = randomInt(this.random, cooldown.min, cooldown.max);
      w.state = 'cooling-down';
      w.lastCompletedAt = now;
      w.nextEligibleAt = now + delaySeconds * 1000;
      w.failureCount = 0;
      w.lastError = null;
    });
  }

  /**
   * Failed: back to idle, eligible again after an exponential backoff
   */
  markFailed(id: number, policy: RetryPolicy, error?: string): WalletRecord {
    return this.transition(id, (w, now) => {
      this.assertRunning(w, 'failed');
      w.failureCount += 1;
      const delaySeconds = Math.min(
        policy.baseDelaySeconds * Math.pow(2, w.failureCount - 1),
        policy.maxDelaySeconds
      );
      w.state = 'idle';
      w.nextEligibleAt = now + delaySeconds * 1000;
      w.lastError = error ?? null;
    });
  }

  /**
   * Operator stop cut the pipeline short: idle again, no cooldown
   */
  markInterrupted(id: number): WalletRecord {
    return this.transition(id, (w) => {
      this.assertRunning(w, 'idle');
      w.state = 'idle';
    });
  }

  /**
   * cooling-down wallets whose time has come go back to idle
   */
  releaseCooldowns(now: number = this.clock.now()): number {
    return this.store.updateMany((w) => {
      if (w.state !== 'cooling-down') return false;
      if (w.nextEligibleAt !== null && w.nextEligibleAt > now) return false;
      w.state = 'idle';
      w.updatedAt = now;
      return true;
    });
  }

  recoverInterrupted(): number {
    const now = this.clock.now();
    return this.store.updateMany((w) => {
      if (w.state !== 'running') return false;
      w.state = 'idle';
      w.updatedAt = now;
      return true;
    });
  }

  // ==========================================================================
  // Operator actions
  // ==========================================================================

  disable(id: number): WalletRecord {
    return this.transition(id, (w) => {
      if (w.state === 'running') {
        throw new InvalidTransitionError(id, w.state, 'disabled');
      }
      w.state = 'disabled';
    });
  }

  enable(id: number): WalletRecord {
    return this.transition(id, (w) => {
      if (w.state !== 'disabled') {
        throw new InvalidTransitionError(id, w.state, 'idle');
      }
      w.state = 'idle';
    });
  }

  remove(id: number): void {
    const record = this.get(id);
    if (record.state === 'running') {
      throw new InvalidTransitionError(id, record.state, 'removed');
    }
    this.store.remove(id);
  }

  /**
   * Merge externally edited proxy / social fields. Identity and run state are
   * never touched.
   */
  syncMetadata(source: MetadataEntry[]): SyncReport {
    const report: SyncReport = { updated: 0, unchanged: 0, unknown: [] };

    for (const entry of source) {
      const record =
        entry.address !== undefined
          ? this.store.getByAddress(entry.address)
          : entry.id !== undefined
            ? this.store.getById(entry.id)
            : undefined;

      if (!record) {
        report.unknown.push(entry.address ?? `#${entry.id ?? '?'}`);
        continue;
      }

      const proxy = entry.proxy === undefined ? record.proxy : entry.proxy;
      const socials: SocialHandles = {
        ...record.socials,
        ...(entry.twitter !== undefined ? { twitter: entry.twitter } : {}),
        ...(entry.discord !== undefined ? { discord: entry.discord } : {}),
      };

      const changed =
        proxy !== record.proxy ||
        socials.twitter !== record.socials.twitter ||
        socials.discord !== record.socials.discord;

      if (!changed) {
        report.unchanged++;
        continue;
      }

      this.store.update(record.id, (w) => {
        w.proxy = proxy;
        w.socials = socials;
        w.updatedAt = this.clock.now();
      });
      report.updated++;
    }

    return report;
  }

  assignReferralCode(id: number, code: string): WalletRecord {
    return this.transition(id, (w) => {
      w.referralCode = code;
    });
  }

  recordProfile(id: number, profile: { points?: number; inviteCode?: string | null }): WalletRecord {
    return this.transition(id, (w) => {
      if (profile.points !== undefined) w.points = profile.points;
      if (profile.inviteCode !== undefined) w.inviteCode = profile.inviteCode;
    });
  }

  replaceProxy(id: number, proxy: string): WalletRecord {
    return this.transition(id, (w) => {
      w.proxy = proxy;
    });
  }

  /** Invite codes reported by the portal for every wallet but `exceptId` */
  harvestedInviteCodes(exceptId?: number): string[] {
    return this.store
      .list()
      .filter((w) => w.id !== exceptId && w.inviteCode)
      .map((w) => w.inviteCode ?? '')
      .filter((code) => code.length > 0);
  }

  // ==========================================================================
  // Vault storage
  // ==========================================================================

  getVaultHeader(): VaultHeader | null {
    return this.store.getVaultHeader();
  }

  setVaultHeader(header: VaultHeader): void {
    this.store.setVaultHeader(header);
  }

  /**
   * Rewrite every secret (and optionally the header) in a single write.
   * Backups holding the previous secrets are deleted.
   */
  rewriteSecrets(
    rewrite: (record: WalletRecord) => { secret: string; encrypted: boolean },
    header: VaultHeader | null
  ): void {
    const rewritten = this.store.list().map((w) => ({ ...w, ...rewrite(w) }));
    this.store.replaceAll(rewritten, header ?? this.store.getVaultHeader(), true);
    this.store.purgeBackups();
  }

  private assertRunning(w: WalletRecord, to: string): void {
    if (w.state !== 'running') {
      throw new InvalidTransitionError(w.id, w.state, to);
    }
  }

  private transition(id: number, mutate: (record: WalletRecord, now: number) => void): WalletRecord {
    const now = this.clock.now();
    // Mutate a detached copy so a refused transition writes nothing
    const draft = this.get(id);
    mutate(draft, now);
    draft.updatedAt = now;

    const updated = this.store.update(id, (w) => {
      Object.assign(w, draft);
    });
    if (!updated) {
      throw new NotFoundError('wallet', id);
    }
    return updated;
  }
}
