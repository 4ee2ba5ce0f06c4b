/**
 * RunCoordinator Unit Tests
 */

import { expect } from 'chai';
import { parseSettings } from '../config';
import { RunCoordinator } from '../coordinator';
import { RunJournal } from '../journal/run-journal';
import { WalletRegistry } from '../registry/wallet-registry';
import { sequenceRandom } from '../utils/random';
import { FakeExecutor, ManualClock, memoryRegistry, silenceLogs } from './fakes';

const CONFIG_INPUT = {
  threads: 2,
  random_pause_start_wallet: { min: 0, max: 0 },
  random_pause_wallet_after_completion: { min: 600, max: 600 },
  rescan_interval_seconds: 60,
};

const CONFIG = parseSettings(CONFIG_INPUT);

describe('RunCoordinator', () => {
  silenceLogs();

  let clock: ManualClock;
  let registry: WalletRegistry;
  let journal: RunJournal;

  beforeEach(() => {
    clock = new ManualClock();
    registry = memoryRegistry(5, clock, sequenceRandom([0]));
    journal = new RunJournal({ file: null, clock }).initialize();
  });

  it('should run every eligible wallet once in single-pass mode', async () => {
    const executor = new FakeExecutor(registry);
    const coordinator = new RunCoordinator({
      registry,
      executor,
      config: CONFIG,
      clock,
      random: sequenceRandom([0]),
      journal,
      once: true,
    });

    const summary = await coordinator.run();

    expect(summary.reason).to.equal('single-pass');
    expect(summary.completed).to.equal(5);
    expect(summary.actions.success).to.equal(5);
    expect([...executor.started].sort()).to.deep.equal([1, 2, 3, 4, 5]);
    expect(executor.peak).to.be.at.most(2);
    expect(coordinator.peakConcurrency).to.equal(2);
    expect(registry.list().every((w) => w.state === 'cooling-down')).to.be.true;

    const events = journal.getRecentEntries().map((e) => e.event);
    expect(events[0]).to.equal('run_start');
    expect(events[events.length - 1]).to.equal('run_stop');
    expect(events.filter((e) => e === 'wallet_completed')).to.have.lengthOf(5);
  });

  it('should admit wallets in shuffled order when shuffle_wallets is set', async () => {
    const executor = new FakeExecutor(registry);
    const config = parseSettings({ ...CONFIG_INPUT, threads: 5, shuffle_wallets: true });

    await new RunCoordinator({ registry, executor, config, clock, random: sequenceRandom([0]), once: true }).run();

    expect(executor.started).to.deep.equal([2, 3, 4, 5, 1]);
  });

  it('should only run selected wallets', async () => {
    const executor = new FakeExecutor(registry);
    const config = parseSettings({ ...CONFIG_INPUT, exact_wallets_to_run: [2, 4] });

    const summary = await new RunCoordinator({ registry, executor, config, clock, once: true }).run();

    expect(summary.completed).to.equal(2);
    expect([...executor.started].sort()).to.deep.equal([2, 4]);
  });

  it('should stop when no selected wallet can run', async () => {
    registry.disable(1);
    registry.disable(2);
    const config = parseSettings({ ...CONFIG_INPUT, range_wallets_to_run: [1, 2] });

    const summary = await new RunCoordinator({
      registry,
      executor: new FakeExecutor(registry),
      config,
      clock,
    }).run();

    expect(summary.reason).to.equal('nothing-eligible');
    expect(summary.completed).to.equal(0);
  });

  it('should finish in-flight wallets and admit no more after stop', async () => {
    const holder: { coordinator?: RunCoordinator } = {};
    const executor = new FakeExecutor(registry, 'completed', () => holder.coordinator?.stop());
    const coordinator = new RunCoordinator({
      registry,
      executor,
      config: parseSettings({ ...CONFIG_INPUT, threads: 1 }),
      clock,
      journal,
    });
    holder.coordinator = coordinator;

    const summary = await coordinator.run();

    expect(summary.reason).to.equal('stopped');
    expect(summary.completed).to.equal(1);
    expect(executor.started).to.deep.equal([1]);
    expect(registry.get(1).state).to.equal('cooling-down');
    expect(registry.get(2).state).to.equal('idle');
    expect(coordinator.isRunning).to.be.false;
  });

  it('should wake up for wallets whose cooldown ends', async () => {
    const executor = new FakeExecutor(registry);
    const config = parseSettings({ ...CONFIG_INPUT, exact_wallets_to_run: [1] });
    let runs = 0;
    const coordinator = new RunCoordinator({
      registry,
      executor: {
        run: async (walletId) => {
          runs++;
          if (runs === 2) coordinator.stop();
          return executor.run(walletId);
        },
      },
      config,
      clock,
    });

    const started = clock.now();
    const summary = await coordinator.run();

    expect(summary.completed).to.equal(2);
    expect(clock.now() - started).to.be.at.least(600_000);
    expect(Math.max(...clock.sleeps)).to.be.at.most(60_000);
  });
});
