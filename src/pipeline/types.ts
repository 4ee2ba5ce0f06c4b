/**
 * Action pipeline types
 */

import { ActionKind, RunConfig } from '../config';
import { ChainGateway, PortalApi, PortalProfile, SignerAccess } from '../actions/types';
import { WalletView } from '../types';
import { Logger } from '../utils/logger';
import { RandomSource } from '../utils/random';

export type UnitStatus = 'success' | 'failed' | 'skipped';

/**
 * Mutable state shared by the units of one wallet run
 */
export interface PipelineState {
  profile: PortalProfile | null;
  /** Last observed balance in lamports, null until read */
  balanceLamports: number | null;
  askedQuestions: Set<string>;
}

export interface ActionContext {
  readonly wallet: WalletView;
  readonly signer: SignerAccess;
  /** Rebound when the wallet's proxy is replaced mid-run */
  portal: PortalApi;
  chain: ChainGateway;
  readonly state: PipelineState;
  readonly config: RunConfig;
  readonly random: RandomSource;
  readonly log: Logger;
}

export interface ActionUnit {
  readonly kind: ActionKind;
  /** Display name, e.g. "swap 2/3" */
  readonly name: string;
  /** Kinds that must not have failed earlier in the run */
  readonly requires?: readonly ActionKind[];
  /**
   * Reason to skip the unit without attempting it, or null to proceed.
   * Runs under the same timeout as one attempt.
   */
  precondition?(ctx: ActionContext, signal: AbortSignal): Promise<string | null>;
  /** Resolves to a short result message; throws on failure */
  execute(ctx: ActionContext, signal: AbortSignal): Promise<string>;
}

export interface UnitOutcome {
  kind: ActionKind;
  name: string;
  status: UnitStatus;
  message: string;
  attempts: number;
  durationMs: number;
}

export interface PipelineResult {
  outcomes: UnitOutcome[];
  /** True when an operator stop cut the pipeline short */
  cancelled: boolean;
}
