/**
 * Scheduler
 *
 * Admits eligible wallets into the worker pool and owns their run-state
 * transitions: running on admission, then completed (cooldown), failed
 * (backoff) or interrupted (operator stop) when the wallet's task settles.
 */

import { RunConfig } from '../config';
import { RunJournal } from '../journal/run-journal';
import { WalletRegistry } from '../registry/wallet-registry';
import { WalletRecord, WalletRunResult, emptyTally } from '../types';
import { Clock } from '../utils/clock';
import { toError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { RandomSource, randomInt } from '../utils/random';
import { WorkerPool } from './worker-pool';

const log = createLogger('scheduler');

/**
 * Runs one wallet to the end of its pipeline; WalletRunner in production
 */
export interface WalletExecutor {
  run(walletId: number, stopSignal?: AbortSignal): Promise<WalletRunResult>;
}

export interface SchedulerDeps {
  registry: WalletRegistry;
  executor: WalletExecutor;
  config: RunConfig;
  clock: Clock;
  random: RandomSource;
  journal?: RunJournal;
  onResult?: (result: WalletRunResult) => void;
}

export class Scheduler {
  private readonly pool: WorkerPool;
  private readonly inFlight = new Set<number>();

  constructor(private readonly deps: SchedulerDeps) {
    this.pool = new WorkerPool(deps.config.threads, (error) =>
      log.error('Wallet task escaped its handler', { error: toError(error).message })
    );
  }

  get freeSlots(): number {
    return this.pool.freeSlots;
  }

  get activeCount(): number {
    return this.pool.active;
  }

  get peakActive(): number {
    return this.pool.peakActive;
  }

  isInFlight(walletId: number): boolean {
    return this.inFlight.has(walletId);
  }

  /**
   * Start wallets in the given order until the pool is full.
   * Returns how many were admitted.
   */
  admit(eligible: readonly WalletRecord[], stopSignal: AbortSignal): number {
    let admitted = 0;

    for (const wallet of eligible) {
      if (this.pool.freeSlots <= 0 || stopSignal.aborted) break;
      if (this.inFlight.has(wallet.id)) continue;

      this.deps.registry.markRunning(wallet.id);
      this.inFlight.add(wallet.id);
      this.pool.start(() => this.runWallet(wallet, stopSignal));
      admitted++;
    }

    return admitted;
  }

  whenAnySettles(): Promise<void> {
    return this.pool.whenAnySettles();
  }

  drain(): Promise<void> {
    return this.pool.drain();
  }

  private async runWallet(wallet: WalletRecord, stopSignal: AbortSignal): Promise<void> {
    const { registry, executor, config, clock } = this.deps;
    const tag = registry.tag(wallet);
    const startedAt = clock.now();
    let result: WalletRunResult;

    try {
      const jitterSeconds = randomInt(this.deps.random, config.startJitterSeconds.min, config.startJitterSeconds.max);
      if (jitterSeconds > 0) {
        log.info(`${tag} Start at ${new Date(clock.now() + jitterSeconds * 1000).toISOString()} | sleeping ${jitterSeconds}s`);
        await clock.sleep(jitterSeconds * 1000, stopSignal);
      }

      if (stopSignal.aborted) {
        result = this.outcome(wallet, 'interrupted', startedAt);
      } else {
        result = await executor.run(wallet.id, stopSignal);
      }
    } catch (error) {
      const message = toError(error).message;
      log.error(`${tag} Wallet run failed: ${message}`);
      result = { ...this.outcome(wallet, 'failed', startedAt), error: message };
    }

    try {
      this.settle(result);
    } finally {
      this.inFlight.delete(wallet.id);
    }
  }

  private settle(result: WalletRunResult): void {
    const { registry, config, journal } = this.deps;
    const tag = registry.tag({ id: result.walletId, address: result.address });

    if (!registry.findByAddress(result.address)) {
      log.warn(`${tag} Wallet removed while running, outcome dropped`);
      this.deps.onResult?.(result);
      return;
    }

    if (result.outcome === 'completed') {
      const record = registry.markCompleted(result.walletId, config.cooldownSeconds);
      const next = record.nextEligibleAt ? new Date(record.nextEligibleAt).toISOString() : 'now';
      log.info(`${tag} Completed | ${result.actions.success} ok, ${result.actions.failed} failed | next run ${next}`);
      journal?.append('wallet_completed', {
        wallet: result.walletId,
        address: result.address,
        success: result.actions.success,
        failed: result.actions.failed,
        skipped: result.actions.skipped,
        nextEligibleAt: record.nextEligibleAt,
      });
    } else if (result.outcome === 'failed') {
      const record = registry.markFailed(
        result.walletId,
        { baseDelaySeconds: config.failureRetryDelaySeconds.min, maxDelaySeconds: config.failureRetryDelaySeconds.max },
        result.error
      );
      journal?.append('wallet_failed', {
        wallet: result.walletId,
        address: result.address,
        error: result.error ?? null,
        failureCount: record.failureCount,
        nextEligibleAt: record.nextEligibleAt,
      });
    } else {
      registry.markInterrupted(result.walletId);
      log.info(`${tag} Interrupted by stop`);
      journal?.append('wallet_interrupted', { wallet: result.walletId, address: result.address });
    }

    this.deps.onResult?.(result);
  }

  private outcome(wallet: WalletRecord, outcome: WalletRunResult['outcome'], startedAt: number): WalletRunResult {
    return {
      walletId: wallet.id,
      address: wallet.address,
      outcome,
      actions: emptyTally(),
      durationMs: this.deps.clock.now() - startedAt,
    };
  }
}
