/**
 * In-process stand-ins shared by the test suites
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Keypair } from '@solana/web3.js';
import bs58 from 'bs58';
import {
  AgentReceipt,
  BridgeRequest,
  ChainGateway,
  ClientFactory,
  PortalApi,
  PortalProfile,
  Quiz,
  QuizQuestion,
  RewardClaim,
  SignerAccess,
  SocialPlatform,
  SocialStatus,
  StakePosition,
  SubmitOptions,
  SwapRequest,
  SwapResult,
} from '../actions/types';
import { RunConfig, parseSettings } from '../config';
import { ActionContext } from '../pipeline/types';
import { WalletRegistry } from '../registry/wallet-registry';
import { WalletStore } from '../registry/wallet-store';
import { WalletExecutor } from '../scheduler/scheduler';
import { WalletRunResult, emptyTally } from '../types';
import { Clock } from '../utils/clock';
import { createLogger, setGlobalLogSink } from '../utils/logger';
import { RandomSource, sequenceRandom } from '../utils/random';
import { CredentialVault } from '../vault/credential-vault';

export const T0 = Date.UTC(2026, 0, 1);

/** Drop log lines for the duration of a suite */
export function silenceLogs(): void {
  before(() => setGlobalLogSink(() => undefined));
  after(() => setGlobalLogSink(null));
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'farmhand-test-'));
}

/**
 * Time moves only through sleep() and advance(). sleep() still yields a
 * macrotask so pending work gets to run.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function newSecret(): { secret: string; address: string } {
  const keypair = Keypair.generate();
  return { secret: bs58.encode(keypair.secretKey), address: keypair.publicKey.toBase58() };
}

/**
 * In-memory registry holding `count` plaintext wallets with ids 1..count
 */
export function memoryRegistry(count: number, clock: Clock = new ManualClock(), random: RandomSource = sequenceRandom([0])): WalletRegistry {
  const registry = new WalletRegistry(new WalletStore(null), { clock, random });
  for (let i = 0; i < count; i++) {
    registry.add({ ...newSecret(), encrypted: false });
  }
  return registry;
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ============================================================================
// Portal / chain
// ============================================================================

export function profile(overrides: Partial<PortalProfile> = {}): PortalProfile {
  return {
    address: 'test-address',
    points: 0,
    inviteCode: null,
    onboardingQuizCompleted: false,
    dailyQuizCompleted: false,
    faucetClaimable: true,
    badges: [],
    ...overrides,
  };
}

const QUESTION: QuizQuestion = { id: 'q1', content: 'What is 2 + 2?', answer: '4' };

export class FakePortal implements PortalApi {
  readonly calls: string[] = [];
  current: PortalProfile | null;
  registeredWith: string | null | undefined = undefined;
  signInError: Error | null = null;
  profileAfterRegister: PortalProfile = profile({ points: 10, inviteCode: 'OWN1' });
  social: SocialStatus = { bound: { twitter: false, discord: false }, tasks: [] };
  portalBalance = 100;
  stakes: StakePosition[] = [];
  /** reportBridge fails this many times before it succeeds */
  reportBridgeFailures = 0;

  constructor(initial: PortalProfile | null = null) {
    this.current = initial;
  }

  async signIn(signer: SignerAccess): Promise<void> {
    this.calls.push('signIn');
    if (this.signInError) throw this.signInError;
    await signer.withSigner(async (keypair) => keypair.publicKey.toBase58());
  }

  async getProfile(): Promise<PortalProfile | null> {
    this.calls.push('getProfile');
    return this.current;
  }

  async register(referralCode: string | null): Promise<PortalProfile> {
    this.calls.push('register');
    this.registeredWith = referralCode;
    this.current = this.profileAfterRegister;
    return this.current;
  }

  async getOnboardingQuiz(): Promise<Quiz> {
    this.calls.push('getOnboardingQuiz');
    return { id: null, questions: [QUESTION] };
  }

  async getDailyQuiz(): Promise<Quiz> {
    this.calls.push('getDailyQuiz');
    return { id: 7, questions: [QUESTION] };
  }

  async submitAnswer(_quiz: Quiz, question: QuizQuestion): Promise<boolean> {
    this.calls.push(`submitAnswer:${question.id}`);
    return true;
  }

  async claimFaucet(): Promise<string> {
    this.calls.push('claimFaucet');
    return 'tx-faucet';
  }

  async mintBadge(badgeId: number): Promise<string> {
    this.calls.push(`mintBadge:${badgeId}`);
    return `tx-mint-${badgeId}`;
  }

  async askAgent(serviceId: string): Promise<string> {
    this.calls.push(`askAgent:${serviceId}`);
    return 'an answer';
  }

  async submitReceipt(): Promise<AgentReceipt> {
    this.calls.push('submitReceipt');
    return { id: 'receipt-1' };
  }

  async getInferenceTx(receiptId: string): Promise<string> {
    this.calls.push(`getInferenceTx:${receiptId}`);
    return 'tx-inference';
  }

  async reportBridge(signature: string): Promise<void> {
    this.calls.push(`reportBridge:${signature}`);
    if (this.reportBridgeFailures > 0) {
      this.reportBridgeFailures--;
      throw new Error('503 Service Unavailable');
    }
  }

  async getSocialStatus(): Promise<SocialStatus> {
    this.calls.push('getSocialStatus');
    return this.social;
  }

  async bindSocial(platform: SocialPlatform, handle: string): Promise<void> {
    this.calls.push(`bindSocial:${platform}:${handle}`);
  }

  async completeSocialTask(taskId: number): Promise<void> {
    this.calls.push(`completeSocialTask:${taskId}`);
  }

  async getPortalBalance(): Promise<number> {
    this.calls.push('getPortalBalance');
    return this.portalBalance;
  }

  async getStakes(): Promise<StakePosition[]> {
    this.calls.push('getStakes');
    return this.stakes;
  }

  async stake(subnetAddress: string, amount: number): Promise<string> {
    this.calls.push(`stake:${subnetAddress}:${amount}`);
    return 'tx-stake';
  }

  async claimStakingRewards(subnetAddress: string): Promise<RewardClaim> {
    this.calls.push(`claimStakingRewards:${subnetAddress}`);
    return { txHash: `tx-claim-${subnetAddress}`, amount: 2 };
  }
}

export class FakeChain implements ChainGateway {
  readonly swaps: SwapRequest[] = [];
  readonly deposits: BridgeRequest[] = [];
  /** When set, balance reads never settle */
  stallBalance = false;
  /** Thrown after a transaction is sent, in place of its confirmation */
  failAfterSubmit: Error | null = null;

  constructor(public balanceLamports: number = 1_000_000_000) {}

  async getBalance(): Promise<number> {
    if (this.stallBalance) return new Promise<number>(() => undefined);
    return this.balanceLamports;
  }

  async swap(signer: SignerAccess, request: SwapRequest, options: SubmitOptions = {}): Promise<SwapResult> {
    await signer.withSigner(async () => undefined);
    this.swaps.push(request);
    const signature = `tx-swap-${this.swaps.length}`;
    options.onSubmitted?.(signature);
    if (this.failAfterSubmit) throw this.failAfterSubmit;
    return { signature, outAmount: '1000' };
  }

  async bridgeDeposit(signer: SignerAccess, request: BridgeRequest, options: SubmitOptions = {}): Promise<string> {
    await signer.withSigner(async () => undefined);
    this.deposits.push(request);
    const signature = `tx-bridge-${this.deposits.length}`;
    options.onSubmitted?.(signature);
    if (this.failAfterSubmit) throw this.failAfterSubmit;
    return signature;
  }
}

/**
 * Hands out a portal per proxy; `portalFor` decides what each proxy gets
 */
export class FakeClientFactory implements ClientFactory {
  readonly portalProxies: (string | null)[] = [];
  readonly chainGateway: FakeChain;

  constructor(
    private readonly portalFor: (proxy: string | null) => FakePortal,
    chain: FakeChain = new FakeChain()
  ) {
    this.chainGateway = chain;
  }

  portal(_address: string, proxy: string | null): PortalApi {
    this.portalProxies.push(proxy);
    return this.portalFor(proxy);
  }

  chain(): ChainGateway {
    return this.chainGateway;
  }
}

/**
 * Context for running units directly against one plaintext wallet
 */
export function actionContext(
  options: { config?: RunConfig; portal?: FakePortal; chain?: FakeChain; random?: RandomSource } = {}
): ActionContext {
  const registry = memoryRegistry(1);
  const vault = new CredentialVault(registry, { encryption: false }).unlock();
  return {
    wallet: registry.view(registry.get(1)),
    signer: { withSigner: (fn) => vault.withSigner(1, fn) },
    portal: options.portal ?? new FakePortal(profile()),
    chain: options.chain ?? new FakeChain(),
    state: { profile: null, balanceLamports: null, askedQuestions: new Set<string>() },
    config: options.config ?? parseSettings({}),
    random: options.random ?? sequenceRandom([0]),
    log: createLogger('test'),
  };
}

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Executor whose runs end when the test says so (or right away with `auto`)
 */
export class FakeExecutor implements WalletExecutor {
  readonly started: number[] = [];
  active = 0;
  peak = 0;
  private readonly pending = new Map<number, (result: WalletRunResult) => void>();

  constructor(
    private readonly registry: WalletRegistry,
    private readonly auto: WalletRunResult['outcome'] | null = 'completed',
    private readonly onStart?: (walletId: number) => void
  ) {}

  run(walletId: number): Promise<WalletRunResult> {
    this.started.push(walletId);
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    this.onStart?.(walletId);

    const address = this.registry.get(walletId).address;
    return new Promise<WalletRunResult>((resolve) => {
      const finish = (result: WalletRunResult) => {
        this.active--;
        resolve(result);
      };
      if (this.auto) {
        const outcome = this.auto;
        setImmediate(() => finish(this.result(walletId, address, outcome)));
      } else {
        this.pending.set(walletId, finish);
      }
    });
  }

  finish(walletId: number, outcome: WalletRunResult['outcome'] = 'completed', error?: string): void {
    const finish = this.pending.get(walletId);
    if (!finish) throw new Error(`Wallet ${walletId} is not running`);
    this.pending.delete(walletId);
    finish({ ...this.result(walletId, this.registry.get(walletId).address, outcome), error });
  }

  private result(walletId: number, address: string, outcome: WalletRunResult['outcome']): WalletRunResult {
    return { walletId, address, outcome, actions: { ...emptyTally(), success: 1 }, durationMs: 0 };
  }
}

/** The value a promise rejects with; fails when it resolves */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
