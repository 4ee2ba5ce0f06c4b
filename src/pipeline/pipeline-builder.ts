/**
 * Builds the ordered unit list for one wallet run
 *
 * Fixed head: registration (new accounts only), then the onboarding quiz when
 * it is still open. The rest is shuffled: daily quiz, faucet, swaps, bridges,
 * badge mints, agent dialogs, social tasks and staking, each gated by its
 * `actions` toggle.
 */

import { PortalProfile } from '../actions/types';
import { RunConfig } from '../config';
import { RandomSource, randomInt, shuffle } from '../utils/random';
import { ActionUnit } from './types';
import {
  agentDialogUnit,
  bridgeUnit,
  claimRewardsUnit,
  dailyQuizUnit,
  faucetUnit,
  mintUnit,
  onboardingUnit,
  registrationUnit,
  socialUnit,
  stakeUnit,
  swapUnit,
} from './units';

export interface BuildInput {
  /** Null when the wallet has no portal account yet */
  profile: PortalProfile | null;
  /** Code to register with; only used for new accounts */
  referralCode: string | null;
}

function repeat(count: number, make: (index: number, total: number) => ActionUnit): ActionUnit[] {
  return Array.from({ length: count }, (_, i) => make(i + 1, count));
}

export function buildPipeline(config: RunConfig, random: RandomSource, input: BuildInput): ActionUnit[] {
  const enabled = config.enabledActions;
  const { profile } = input;
  const head: ActionUnit[] = [];

  if (!profile) {
    head.push(registrationUnit(enabled.referral ? input.referralCode : null));
  }
  if (!profile || !profile.onboardingQuizCompleted) {
    head.push(onboardingUnit());
  }

  const block: ActionUnit[] = [];

  if (enabled.quiz && (!profile || !profile.dailyQuizCompleted)) {
    block.push(dailyQuizUnit());
  }
  if (enabled.faucet && (!profile || profile.faucetClaimable)) {
    block.push(faucetUnit());
  }
  if (enabled.swap) {
    block.push(...repeat(randomInt(random, config.swapsCount.min, config.swapsCount.max), swapUnit));
  }
  if (enabled.bridge) {
    block.push(...repeat(randomInt(random, config.bridgesCount.min, config.bridgesCount.max), bridgeUnit));
  }
  if (enabled.mint && profile) {
    for (const badge of profile.badges) {
      if (badge.eligible && !badge.minted) {
        block.push(mintUnit(badge));
      }
    }
  }
  if (enabled.ai_dialog) {
    block.push(...repeat(randomInt(random, config.aiDialogsCount.min, config.aiDialogsCount.max), agentDialogUnit));
  }
  if (enabled.social) {
    block.push(socialUnit());
  }
  if (enabled.staking) {
    block.push(stakeUnit(), claimRewardsUnit());
  }

  return [...head, ...shuffle(random, block)];
}
