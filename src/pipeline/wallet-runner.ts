/**
 * Wallet Runner
 *
 * One complete pass for one wallet:
 *   1. prove the credential decrypts (mandatory)
 *   2. sign in and fetch the portal profile (mandatory, proxy failover once)
 *   3. build and run the action pipeline
 *   4. refresh the profile and record points / invite code (best effort)
 *
 * A failing mandatory step throws; unit failures never do.
 */

import { PortalProfile, ClientFactory, SignerAccess } from '../actions/types';
import { ReserveProxyPool } from '../actions/reserve-proxies';
import { RunConfig } from '../config';
import { ReferralPool } from '../registry/referral-pool';
import { WalletRegistry } from '../registry/wallet-registry';
import { WalletRunResult, emptyTally } from '../types';
import { Clock } from '../utils/clock';
import { ActionFailure, isProxyError, toError } from '../utils/errors';
import { createLogger, maskProxy } from '../utils/logger';
import { RandomSource } from '../utils/random';
import { withRetryAndTimeout } from '../utils/retry';
import { VaultHandle } from '../vault/credential-vault';
import { ActionPipeline } from './action-pipeline';
import { buildPipeline } from './pipeline-builder';
import { ActionContext, PipelineState } from './types';

const log = createLogger('wallet');

export interface WalletRunnerDeps {
  registry: WalletRegistry;
  vault: VaultHandle;
  clients: ClientFactory;
  referrals: ReferralPool;
  reserveProxies: ReserveProxyPool | null;
  config: RunConfig;
  clock: Clock;
  random: RandomSource;
  /** Backoff base for unit retries; tests shorten it */
  retryBaseDelayMs?: number;
}

export class WalletRunner {
  private readonly pipeline: ActionPipeline;

  constructor(private readonly deps: WalletRunnerDeps) {
    this.pipeline = new ActionPipeline({
      clock: deps.clock,
      random: deps.random,
      pacing: deps.config.pacingSeconds,
      timeoutMs: deps.config.actionTimeoutMs,
      retries: deps.config.actionRetries,
      retryBaseDelayMs: deps.retryBaseDelayMs,
      onUnitFailure: async (_unit, failure, ctx) => {
        if (!isProxyError(failure.cause ?? failure) || !this.failover(ctx)) return;
        try {
          await ctx.portal.signIn(ctx.signer);
        } catch (error) {
          log.warn(`${ctx.wallet.tag} Sign-in through the reserve proxy failed`, { error: toError(error).message });
        }
      },
    });
  }

  async run(walletId: number, stopSignal?: AbortSignal): Promise<WalletRunResult> {
    const { registry, vault, clients, config, clock } = this.deps;
    const startedAt = clock.now();
    const record = registry.get(walletId);
    const wallet = registry.view(record);

    const signer: SignerAccess = {
      withSigner: (fn) => vault.withSigner(walletId, fn),
    };
    await signer.withSigner(async () => undefined);

    const ctx: ActionContext = {
      wallet,
      signer,
      portal: clients.portal(wallet.address, record.proxy),
      chain: clients.chain(record.proxy),
      state: { profile: null, balanceLamports: null, askedQuestions: new Set<string>() } satisfies PipelineState,
      config,
      random: this.deps.random,
      log,
    };

    log.info(`${wallet.tag} Starting session`, { proxy: maskProxy(record.proxy) });
    ctx.state.profile = await this.openSession(ctx);

    const referralCode = ctx.state.profile ? null : this.deps.referrals.ensureAssigned(registry, record);
    const units = buildPipeline(config, this.deps.random, { profile: ctx.state.profile, referralCode });
    log.info(`${wallet.tag} Started activity | ${units.length} actions planned`);

    const result = await this.pipeline.run(ctx, units, stopSignal);

    await this.refreshProfile(ctx);

    const actions = emptyTally();
    for (const outcome of result.outcomes) {
      if (outcome.status === 'success') actions.success++;
      else if (outcome.status === 'failed') actions.failed++;
      else actions.skipped++;
    }

    return {
      walletId,
      address: wallet.address,
      outcome: result.cancelled ? 'interrupted' : 'completed',
      actions,
      durationMs: clock.now() - startedAt,
    };
  }

  /**
   * Sign in and fetch the profile. A proxy failure gets one more try through
   * a reserve proxy.
   */
  private async openSession(ctx: ActionContext): Promise<PortalProfile | null> {
    const attempt = () =>
      withRetryAndTimeout(
        'session',
        async () => {
          await ctx.portal.signIn(ctx.signer);
          return ctx.portal.getProfile();
        },
        this.deps.config.actionTimeoutMs,
        {
          maxRetries: this.deps.config.actionRetries,
          ...(this.deps.retryBaseDelayMs !== undefined ? { baseDelayMs: this.deps.retryBaseDelayMs } : {}),
        },
        { clock: this.deps.clock }
      );

    try {
      return (await attempt()).value;
    } catch (error) {
      const err = toError(error);
      const cause = err instanceof ActionFailure ? err.cause ?? err : err;
      if (!isProxyError(cause) || !this.failover(ctx)) {
        throw new ActionFailure('session', err.message, err);
      }
      return (await attempt()).value;
    }
  }

  /**
   * Replace the wallet's proxy with a reserve one and rebind the clients.
   * False when there is no proxy to replace or no reserve left.
   */
  private failover(ctx: ActionContext): boolean {
    const current = this.deps.registry.get(ctx.wallet.id).proxy;
    if (!current || !this.deps.reserveProxies) return false;

    const replacement = this.deps.reserveProxies.take();
    if (!replacement) {
      log.warn(`${ctx.wallet.tag} Proxy failed and no reserve proxy is left`);
      return false;
    }

    this.deps.registry.replaceProxy(ctx.wallet.id, replacement);
    ctx.portal = this.deps.clients.portal(ctx.wallet.address, replacement);
    ctx.chain = this.deps.clients.chain(replacement);
    log.warn(`${ctx.wallet.tag} Proxy replaced`, { from: maskProxy(current), to: maskProxy(replacement) });
    return true;
  }

  private async refreshProfile(ctx: ActionContext): Promise<void> {
    try {
      const profile = await ctx.portal.getProfile();
      if (profile) {
        this.deps.registry.recordProfile(ctx.wallet.id, { points: profile.points, inviteCode: profile.inviteCode });
        log.info(`${ctx.wallet.tag} Points: ${profile.points}`);
      }
    } catch (error) {
      log.warn(`${ctx.wallet.tag} Could not refresh profile`, { error: toError(error).message });
    }
  }
}
