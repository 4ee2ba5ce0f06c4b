/**
 * WalletRunner Unit Tests
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as path from 'path';
import { ReserveProxyPool } from '../../actions/reserve-proxies';
import { parseSettings } from '../../config';
import { FakeClientFactory, FakePortal, ManualClock, memoryRegistry, profile, rejectionOf, silenceLogs, tempDir } from '../../__tests__/fakes';
import { ReferralPool } from '../../registry/referral-pool';
import { WalletRegistry } from '../../registry/wallet-registry';
import { ActionFailure } from '../../utils/errors';
import { sequenceRandom } from '../../utils/random';
import { CredentialVault } from '../../vault/credential-vault';
import { WalletRunner } from '../wallet-runner';

const PRIMARY_PROXY = 'http://u:p@10.0.0.1:8080';
const RESERVE_PROXY = 'http://u:p@10.0.0.2:8080';

// Registration, onboarding, daily quiz and faucet only
const CONFIG = parseSettings({
  invite_codes: ['INV1'],
  random_pause_between_actions: { min: 0, max: 0 },
  action_retries: 0,
  actions: { swap: false, bridge: false, mint: false, ai_dialog: false },
});

describe('WalletRunner', () => {
  silenceLogs();

  let dir: string;
  let registry: WalletRegistry;
  let clock: ManualClock;

  beforeEach(() => {
    dir = tempDir();
    clock = new ManualClock();
    registry = memoryRegistry(1, clock);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function runner(clients: FakeClientFactory, reserveProxies: ReserveProxyPool | null = null): WalletRunner {
    return new WalletRunner({
      registry,
      vault: new CredentialVault(registry, { encryption: false }).unlock(),
      clients,
      referrals: new ReferralPool(CONFIG.inviteCodes, sequenceRandom([0])),
      reserveProxies,
      config: CONFIG,
      clock,
      random: sequenceRandom([0]),
      retryBaseDelayMs: 1,
    });
  }

  it('should onboard a new account end to end', async () => {
    const portal = new FakePortal(null);

    const result = await runner(new FakeClientFactory(() => portal)).run(1);

    expect(result.outcome).to.equal('completed');
    expect(result.actions).to.deep.equal({ success: 4, failed: 0, skipped: 0 });
    expect(portal.registeredWith).to.equal('INV1');
    expect(portal.calls.slice(0, 3)).to.deep.equal(['signIn', 'getProfile', 'register']);
    const record = registry.get(1);
    expect(record.referralCode).to.equal('INV1');
    expect(record.points).to.equal(10);
    expect(record.inviteCode).to.equal('OWN1');
  });

  it('should not assign a referral code to an existing account', async () => {
    const portal = new FakePortal(profile({ onboardingQuizCompleted: true, points: 3 }));

    const result = await runner(new FakeClientFactory(() => portal)).run(1);

    expect(result.actions.success).to.equal(2);
    expect(portal.calls).to.not.include('register');
    expect(registry.get(1).referralCode).to.be.null;
    expect(registry.get(1).points).to.equal(3);
  });

  it('should fail the wallet when the session cannot be opened', async () => {
    const portal = new FakePortal(null);
    portal.signInError = new Error('HTTP 403: Forbidden');

    const error = await rejectionOf(runner(new FakeClientFactory(() => portal)).run(1));

    expect(error).to.be.instanceOf(ActionFailure).and.have.property('message', 'session | HTTP 403: Forbidden');
  });

  it('should move to a reserve proxy when the proxy itself fails', async () => {
    const reserveFile = path.join(dir, 'reserve_proxy.txt');
    fs.writeFileSync(reserveFile, `${RESERVE_PROXY}\n`);
    registry.replaceProxy(1, PRIMARY_PROXY);
    const clients = new FakeClientFactory((proxy) => {
      const portal = new FakePortal(profile({ onboardingQuizCompleted: true }));
      if (proxy === PRIMARY_PROXY) {
        portal.signInError = new Error('tunneling socket could not be established');
      }
      return portal;
    });

    const result = await runner(clients, new ReserveProxyPool(reserveFile)).run(1);

    expect(result.outcome).to.equal('completed');
    expect(clients.portalProxies).to.deep.equal([PRIMARY_PROXY, RESERVE_PROXY]);
    expect(registry.get(1).proxy).to.equal(RESERVE_PROXY);
    expect(fs.readFileSync(reserveFile, 'utf-8')).to.equal('');
  });

  it('should report an interrupted run when stopped mid-pipeline', async () => {
    const stop = new AbortController();
    const portal = new FakePortal(profile({ onboardingQuizCompleted: true }));
    const claim = portal.claimFaucet.bind(portal);
    portal.claimFaucet = async () => {
      stop.abort();
      return claim();
    };

    const result = await runner(new FakeClientFactory(() => portal)).run(1, stop.signal);

    expect(result.outcome).to.equal('interrupted');
    expect(result.actions.success).to.equal(1);
    expect(result.actions.skipped).to.equal(1);
  });
});
