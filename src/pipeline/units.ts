/**
 * Action unit factories
 *
 * One factory per action kind. Units read and update the shared
 * PipelineState; none of them holds key material beyond a withSigner call.
 */

import { LAMPORTS_PER_SOL } from '@solana/web3.js';
import { pickDialog } from '../actions/agent-prompts';
import { NATIVE_MINT } from '../actions/chain-gateway';
import { Badge, Quiz, SocialPlatform } from '../actions/types';
import { Bounds } from '../config';
import { ActionFailure } from '../utils/errors';
import { RandomSource, pick, randomInt } from '../utils/random';
import { ActionContext, ActionUnit } from './types';

const SWAP_SLIPPAGE_BPS = 100;

function formatSol(lamports: number): string {
  return (lamports / LAMPORTS_PER_SOL).toFixed(4);
}

/**
 * Uniform percentage within bounds, not rounded
 */
export function drawPercent(random: RandomSource, bounds: Bounds): number {
  return bounds.min + random.next() * (bounds.max - bounds.min);
}

async function observeBalance(ctx: ActionContext): Promise<number> {
  if (ctx.state.balanceLamports === null) {
    ctx.state.balanceLamports = await ctx.chain.getBalance(ctx.wallet.address);
  }
  return ctx.state.balanceLamports;
}

async function requireBalance(ctx: ActionContext): Promise<string | null> {
  const balance = await observeBalance(ctx);
  const minimum = Math.round(ctx.config.minBalanceSol * LAMPORTS_PER_SOL);
  if (balance < minimum) {
    return `insufficient balance: ${formatSol(balance)} SOL < ${ctx.config.minBalanceSol} SOL`;
  }
  return null;
}

async function answerQuiz(ctx: ActionContext, quiz: Quiz, finishEach: boolean, signal: AbortSignal): Promise<number> {
  if (quiz.questions.length === 0) {
    throw new Error('Quiz has no questions');
  }

  for (let i = 0; i < quiz.questions.length; i++) {
    const question = quiz.questions[i];
    const finish = finishEach || i === quiz.questions.length - 1;
    const right = await ctx.portal.submitAnswer(quiz, question, finish, signal);
    if (!right) {
      throw new Error(`Answer rejected for question ${question.id}`);
    }
    ctx.log.debug(`Answered: ${question.content}`);
  }
  return quiz.questions.length;
}

/**
 * Portal account creation, carrying the referral code when there is one
 */
export function registrationUnit(referralCode: string | null): ActionUnit {
  return {
    kind: 'referral',
    name: 'registration',
    async execute(ctx, signal) {
      ctx.state.profile = await ctx.portal.register(referralCode, signal);
      return referralCode ? `Registered with invite code ${referralCode}` : 'Registered without invite code';
    },
  };
}

export function onboardingUnit(): ActionUnit {
  return {
    kind: 'onboarding',
    name: 'onboarding quiz',
    requires: ['referral'],
    async execute(ctx, signal) {
      const answered = await answerQuiz(ctx, await ctx.portal.getOnboardingQuiz(signal), false, signal);
      return `Onboarding quiz completed (${answered} questions)`;
    },
  };
}

export function dailyQuizUnit(): ActionUnit {
  return {
    kind: 'quiz',
    name: 'daily quiz',
    requires: ['referral'],
    async execute(ctx, signal) {
      const answered = await answerQuiz(ctx, await ctx.portal.getDailyQuiz(signal), true, signal);
      return `Daily quiz submitted (${answered} questions)`;
    },
  };
}

export function faucetUnit(): ActionUnit {
  return {
    kind: 'faucet',
    name: 'faucet',
    requires: ['referral'],
    async execute(ctx, signal) {
      const tx = await ctx.portal.claimFaucet(signal);
      ctx.state.balanceLamports = null;
      return `Faucet claimed | tx ${tx}`;
    },
  };
}

/**
 * Once a swap transaction is on the wire, a retry must not send a second one:
 * the attempt that timed out may still land.
 */
export function swapUnit(index: number, total: number): ActionUnit {
  const name = `swap ${index}/${total}`;
  let submitted: string | null = null;

  return {
    kind: 'swap',
    name,
    precondition: requireBalance,
    async execute(ctx, signal) {
      if (submitted) {
        throw new ActionFailure(name, `transaction ${submitted} was already sent; not sending another`);
      }

      const balance = await observeBalance(ctx);
      const percent = drawPercent(ctx.random, ctx.config.swapsPercent);
      const amountLamports = Math.floor((balance * percent) / 100);
      if (amountLamports <= 0) {
        throw new Error(`Swap amount rounds to zero (${percent.toFixed(2)}% of ${balance} lamports)`);
      }

      const result = await ctx.chain.swap(
        ctx.signer,
        {
          inputMint: NATIVE_MINT,
          outputMint: ctx.config.swapOutputMint,
          amountLamports,
          slippageBps: SWAP_SLIPPAGE_BPS,
        },
        {
          signal,
          onSubmitted: (signature) => {
            submitted = signature;
          },
        }
      );
      ctx.state.balanceLamports = null;
      return `Swapped ${formatSol(amountLamports)} SOL -> ${result.outAmount} | tx ${result.signature}`;
    },
  };
}

/**
 * Deposit, then report it to the portal. A retry after the deposit was sent
 * only repeats the report, and only when the deposit confirmed.
 */
export function bridgeUnit(index: number, total: number): ActionUnit {
  const name = `bridge ${index}/${total}`;
  let submitted: string | null = null;
  let confirmed: { signature: string; amountLamports: number } | null = null;

  return {
    kind: 'bridge',
    name,
    async precondition(ctx) {
      if (!ctx.config.bridgeDepositAddress) {
        return 'no bridge deposit address configured';
      }
      return requireBalance(ctx);
    },
    async execute(ctx, signal) {
      const chainId = ctx.config.bridgeDestinationChainId;
      let deposit = confirmed;

      if (!deposit) {
        if (submitted) {
          throw new ActionFailure(name, `deposit ${submitted} was already sent; not sending another`);
        }
        const depositAddress = ctx.config.bridgeDepositAddress;
        if (!depositAddress) {
          throw new Error('No bridge deposit address configured');
        }

        const balance = await observeBalance(ctx);
        const percent = drawPercent(ctx.random, ctx.config.bridgePercent);
        const amountLamports = Math.floor((balance * percent) / 100);
        if (amountLamports <= 0) {
          throw new Error(`Bridge amount rounds to zero (${percent.toFixed(2)}% of ${balance} lamports)`);
        }

        const signature = await ctx.chain.bridgeDeposit(
          ctx.signer,
          { depositAddress, amountLamports },
          {
            signal,
            onSubmitted: (sent) => {
              submitted = sent;
            },
          }
        );
        ctx.state.balanceLamports = null;
        deposit = { signature, amountLamports };
        confirmed = deposit;
      }

      await ctx.portal.reportBridge(deposit.signature, deposit.amountLamports, chainId, signal);
      return `Bridged ${formatSol(deposit.amountLamports)} SOL to chain ${chainId} | tx ${deposit.signature}`;
    },
  };
}

export function mintUnit(badge: Badge): ActionUnit {
  return {
    kind: 'mint',
    name: `mint ${badge.name}`,
    requires: ['referral'],
    async execute(ctx, signal) {
      const tx = await ctx.portal.mintBadge(badge.id, signal);
      return `Badge ${badge.name} minted | tx ${tx}`;
    },
  };
}

export function agentDialogUnit(index: number, total: number): ActionUnit {
  return {
    kind: 'ai_dialog',
    name: `ai dialog ${index}/${total}`,
    requires: ['referral'],
    async execute(ctx, signal) {
      const dialog = pickDialog(ctx.random, ctx.state.askedQuestions);
      if (!dialog) {
        throw new Error('No unasked agent questions left');
      }
      ctx.state.askedQuestions.add(dialog.question);

      const { agent, question } = dialog;
      ctx.log.debug(`Agent: ${agent.agent} | Question: ${question}`);
      const answer = await ctx.portal.askAgent(agent.service, question, signal);
      const receipt = await ctx.portal.submitReceipt(agent.service, question, answer, signal);
      const tx = await ctx.portal.getInferenceTx(receipt.id, signal);
      return `Agent: ${agent.agent} | Conversation completed | tx ${tx}`;
    },
  };
}

const PLATFORMS: readonly SocialPlatform[] = ['twitter', 'discord'];

/**
 * Bind the handles from the wallet's metadata, then finish the open tasks of
 * every bound platform
 */
export function socialUnit(): ActionUnit {
  return {
    kind: 'social',
    name: 'social tasks',
    requires: ['referral'],
    async precondition(ctx) {
      return PLATFORMS.some((platform) => ctx.wallet.socials[platform]) ? null : 'no social handles in metadata';
    },
    async execute(ctx, signal) {
      const status = await ctx.portal.getSocialStatus(signal);
      const bound = { ...status.bound };
      let newlyBound = 0;

      for (const platform of PLATFORMS) {
        const handle = ctx.wallet.socials[platform];
        if (bound[platform] || !handle) continue;
        await ctx.portal.bindSocial(platform, handle, signal);
        bound[platform] = true;
        newlyBound++;
      }

      let completed = 0;
      for (const task of status.tasks) {
        if (task.completed || !bound[task.platform]) continue;
        await ctx.portal.completeSocialTask(task.id, signal);
        ctx.log.debug(`Social task done: ${task.title}`);
        completed++;
      }

      return `Social: ${newlyBound} account(s) bound, ${completed} task(s) completed`;
    },
  };
}

export function stakeUnit(): ActionUnit {
  return {
    kind: 'staking',
    name: 'stake',
    requires: ['referral'],
    async precondition(ctx, signal) {
      if (ctx.config.stakingSubnets.length === 0) {
        return 'no staking subnets configured';
      }
      const balance = await ctx.portal.getPortalBalance(signal);
      if (balance < ctx.config.stakeAmount.min) {
        return `portal balance ${balance} below stake minimum ${ctx.config.stakeAmount.min}`;
      }
      return null;
    },
    async execute(ctx, signal) {
      const subnet = pick(ctx.random, ctx.config.stakingSubnets);
      if (!subnet) {
        throw new Error('No staking subnets configured');
      }
      const balance = await ctx.portal.getPortalBalance(signal);
      const { min, max } = ctx.config.stakeAmount;
      const amount = Math.min(randomInt(ctx.random, min, max), Math.floor(balance));
      if (amount <= 0) {
        throw new Error(`Nothing to stake (portal balance ${balance})`);
      }

      const tx = await ctx.portal.stake(subnet, amount, signal);
      return `Staked ${amount} to subnet ${subnet} | tx ${tx}`;
    },
  };
}

export function claimRewardsUnit(): ActionUnit {
  return {
    kind: 'staking',
    name: 'claim staking rewards',
    requires: ['referral'],
    async execute(ctx, signal) {
      const stakes = (await ctx.portal.getStakes(signal)).filter((s) => s.amount > 0);
      if (stakes.length === 0) {
        return 'No staked subnets to claim from';
      }

      let total = 0;
      for (const { subnetAddress } of stakes) {
        const claim = await ctx.portal.claimStakingRewards(subnetAddress, signal);
        ctx.log.debug(`Claimed ${claim.amount} from subnet ${subnetAddress} | tx ${claim.txHash}`);
        total += claim.amount;
      }
      return `Claimed ${total} in staking rewards from ${stakes.length} subnet(s)`;
    },
  };
}
