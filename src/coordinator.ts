/**
 * Run Coordinator
 *
 * Top-level loop of a farming run:
 *   release cooldowns -> fetch eligible -> admit up to free slots ->
 *   wait for a completion, the next wake time or stop
 *
 * Terminates on operator stop, when no selected wallet can ever become
 * eligible again, or after a single pass in --once mode.
 */

import { createClientFactory } from './actions/client-factory';
import { ClientFactory } from './actions/types';
import { ReserveProxyPool } from './actions/reserve-proxies';
import { Env, RunConfig, loadSettings, resolvePaths } from './config';
import { RunJournal } from './journal/run-journal';
import { WalletRunner } from './pipeline/wallet-runner';
import { ReferralPool } from './registry/referral-pool';
import { describeSelection } from './registry/selection';
import { WalletRegistry } from './registry/wallet-registry';
import { Scheduler, WalletExecutor } from './scheduler/scheduler';
import { RunSummary, WalletRunResult, emptyTally } from './types';
import { Clock, systemClock } from './utils/clock';
import { createLogger, setGlobalLogLevel } from './utils/logger';
import { RandomSource, mathRandom, shuffle } from './utils/random';
import { CredentialVault, VaultHandle } from './vault/credential-vault';

const log = createLogger('coordinator');

export interface RunCoordinatorDeps {
  registry: WalletRegistry;
  executor: WalletExecutor;
  config: RunConfig;
  clock?: Clock;
  random?: RandomSource;
  journal?: RunJournal;
  /** Run every eligible wallet once, then stop */
  once?: boolean;
}

export class RunCoordinator {
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly stopController = new AbortController();
  private readonly scheduler: Scheduler;
  private readonly results: WalletRunResult[] = [];
  private running = false;

  constructor(private readonly deps: RunCoordinatorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? mathRandom;
    this.scheduler = new Scheduler({
      registry: deps.registry,
      executor: deps.executor,
      config: deps.config,
      clock: this.clock,
      random: this.random,
      journal: deps.journal,
      onResult: (result) => this.results.push(result),
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Highest number of wallets that ran at the same time */
  get peakConcurrency(): number {
    return this.scheduler.peakActive;
  }

  /**
   * No new admissions after this; in-flight wallets finish their current unit
   */
  stop(): void {
    if (this.stopController.signal.aborted) return;
    log.info('Stop requested, waiting for in-flight actions to finish');
    this.stopController.abort();
  }

  async run(): Promise<RunSummary> {
    if (this.running) {
      throw new Error('Run already in progress');
    }
    this.running = true;

    const { registry, config, journal } = this.deps;
    const selection = config.selection;
    const stopSignal = this.stopController.signal;
    const startedAt = this.clock.now();
    const admittedOnce = new Set<number>();
    let reason: RunSummary['reason'];

    log.info('Run started', {
      wallets: registry.size,
      selection: describeSelection(selection),
      threads: config.threads,
      mode: this.deps.once ? 'single-pass' : 'continuous',
    });
    journal?.append('run_start', { wallets: registry.size, threads: config.threads, once: this.deps.once ?? false });

    try {
      for (;;) {
        if (stopSignal.aborted) {
          reason = 'stopped';
          break;
        }

        const now = this.clock.now();
        registry.releaseCooldowns(now);

        const candidates = registry
          .eligibleWallets(selection, now)
          .filter((w) => !this.scheduler.isInFlight(w.id) && !(this.deps.once && admittedOnce.has(w.id)));
        const eligible = config.shuffleWallets ? shuffle(this.random, candidates) : candidates;

        const admitted = this.scheduler.admit(eligible, stopSignal);
        for (const wallet of eligible.slice(0, admitted)) {
          admittedOnce.add(wallet.id);
        }
        if (admitted > 0) {
          log.debug(`Admitted ${admitted} wallet(s)`, { active: this.scheduler.activeCount });
        }

        const idle = this.scheduler.activeCount === 0;
        if (idle && this.deps.once && eligible.length === admitted) {
          reason = 'single-pass';
          break;
        }
        if (idle && !registry.hasRunnable(selection)) {
          reason = 'nothing-eligible';
          break;
        }

        await this.waitForWork(now);
      }

      await this.scheduler.drain();
    } finally {
      this.running = false;
    }

    const summary = this.summarise(startedAt, reason);
    journal?.append('run_stop', {
      reason: summary.reason,
      completed: summary.completed,
      failed: summary.failed,
      interrupted: summary.interrupted,
    });
    log.info('Run finished', { ...summary });
    return summary;
  }

  /**
   * Sleep until a wallet settles, the next wallet becomes eligible (capped by
   * the rescan interval) or stop is requested
   */
  private async waitForWork(now: number): Promise<void> {
    const { registry, config } = this.deps;
    const wake = registry.nextWakeTime(config.selection, now);
    const delayMs = Math.max(0, Math.min(wake === null ? config.rescanIntervalMs : wake - now, config.rescanIntervalMs));

    if (this.scheduler.activeCount === 0) {
      log.info(`No wallet running, next scan at ${new Date(now + delayMs).toISOString()}`);
    }

    const wakeController = new AbortController();
    const onStop = () => wakeController.abort();
    if (this.stopController.signal.aborted) onStop();
    this.stopController.signal.addEventListener('abort', onStop, { once: true });

    try {
      const waits = [this.clock.sleep(delayMs, wakeController.signal)];
      if (this.scheduler.activeCount > 0) {
        waits.push(this.scheduler.whenAnySettles());
      }
      await Promise.race(waits);
    } finally {
      wakeController.abort();
      this.stopController.signal.removeEventListener('abort', onStop);
    }
  }

  private summarise(startedAt: number, reason: RunSummary['reason']): RunSummary {
    const actions = emptyTally();
    let completed = 0;
    let failed = 0;
    let interrupted = 0;

    for (const result of this.results) {
      if (result.outcome === 'completed') completed++;
      else if (result.outcome === 'failed') failed++;
      else interrupted++;
      actions.success += result.actions.success;
      actions.failed += result.actions.failed;
      actions.skipped += result.actions.skipped;
    }

    return { startedAt, finishedAt: this.clock.now(), completed, failed, interrupted, actions, reason };
  }
}

// ============================================================================
// Wiring
// ============================================================================

export interface PrepareRunOptions {
  password?: string;
  once?: boolean;
  clock?: Clock;
  random?: RandomSource;
  /** Replaces the HTTP / RPC clients */
  clients?: ClientFactory;
}

export interface PreparedRun {
  coordinator: RunCoordinator;
  registry: WalletRegistry;
  vault: VaultHandle;
  config: RunConfig;
}

/**
 * Load settings, open the registry, unlock the vault and wire a coordinator.
 * The registry holds the store lock; the caller closes it after the run.
 */
export function prepareRun(env: Env, options: PrepareRunOptions = {}): PreparedRun {
  const clock = options.clock ?? systemClock;
  const random = options.random ?? mathRandom;
  const paths = resolvePaths(env);

  const config = loadSettings(paths.settings);
  setGlobalLogLevel(config.logLevel);

  const registry = WalletRegistry.open(paths.store, {
    clock,
    random,
    showAddressInLogs: config.showAddressInLogs,
    exclusive: true,
  });

  try {
    const vault = new CredentialVault(registry, { encryption: config.encryption }).unlock(options.password);
    const journal = new RunJournal({ file: paths.journal, clock }).initialize();

    const executor = new WalletRunner({
      registry,
      vault,
      clients: options.clients ?? createClientFactory(env, config.actionTimeoutMs),
      referrals: new ReferralPool(config.inviteCodes, random),
      reserveProxies: new ReserveProxyPool(paths.reserveProxies),
      config,
      clock,
      random,
    });

    const coordinator = new RunCoordinator({ registry, executor, config, clock, random, journal, once: options.once });
    return { coordinator, registry, vault, config };
  } catch (error) {
    registry.close();
    throw error;
  }
}
