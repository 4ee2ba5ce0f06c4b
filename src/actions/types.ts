/**
 * Ecosystem collaborators
 *
 * The pipeline only talks to these interfaces; HttpPortalApi and
 * SolanaChainGateway are the production implementations, tests use fakes.
 */

import { Keypair } from '@solana/web3.js';

/**
 * Scoped access to a wallet's keypair. The key bytes are wiped when fn settles.
 */
export interface SignerAccess {
  withSigner<T>(fn: (signer: Keypair) => Promise<T>): Promise<T>;
}

// ============================================================================
// Portal
// ============================================================================

export interface Badge {
  id: number;
  name: string;
  eligible: boolean;
  minted: boolean;
}

export interface PortalProfile {
  address: string;
  points: number;
  inviteCode: string | null;
  onboardingQuizCompleted: boolean;
  dailyQuizCompleted: boolean;
  faucetClaimable: boolean;
  badges: Badge[];
}

export interface QuizQuestion {
  id: string;
  content: string;
  /** Answer revealed by the quiz endpoint */
  answer: string;
}

export interface Quiz {
  /** Null for the onboarding quiz */
  id: number | null;
  questions: QuizQuestion[];
}

export interface AgentReceipt {
  id: string;
}

export type SocialPlatform = 'twitter' | 'discord';

export interface SocialTask {
  id: number;
  platform: SocialPlatform;
  title: string;
  completed: boolean;
}

export interface SocialStatus {
  bound: Record<SocialPlatform, boolean>;
  tasks: SocialTask[];
}

export interface StakePosition {
  subnetAddress: string;
  amount: number;
}

export interface RewardClaim {
  txHash: string;
  amount: number;
}

/**
 * Portal session. Calls made from action units take the attempt's abort
 * signal, which fires when the attempt times out.
 */
export interface PortalApi {
  signIn(signer: SignerAccess): Promise<void>;
  /** Null when the wallet has no portal account yet */
  getProfile(): Promise<PortalProfile | null>;
  register(referralCode: string | null, signal?: AbortSignal): Promise<PortalProfile>;
  getOnboardingQuiz(signal?: AbortSignal): Promise<Quiz>;
  getDailyQuiz(signal?: AbortSignal): Promise<Quiz>;
  submitAnswer(quiz: Quiz, question: QuizQuestion, finish: boolean, signal?: AbortSignal): Promise<boolean>;
  claimFaucet(signal?: AbortSignal): Promise<string>;
  mintBadge(badgeId: number, signal?: AbortSignal): Promise<string>;
  askAgent(serviceId: string, question: string, signal?: AbortSignal): Promise<string>;
  submitReceipt(serviceId: string, question: string, answer: string, signal?: AbortSignal): Promise<AgentReceipt>;
  getInferenceTx(receiptId: string, signal?: AbortSignal): Promise<string>;
  reportBridge(signature: string, amountLamports: number, destinationChainId: number, signal?: AbortSignal): Promise<void>;
  getSocialStatus(signal?: AbortSignal): Promise<SocialStatus>;
  bindSocial(platform: SocialPlatform, handle: string, signal?: AbortSignal): Promise<void>;
  completeSocialTask(taskId: number, signal?: AbortSignal): Promise<void>;
  /** Spendable portal token balance */
  getPortalBalance(signal?: AbortSignal): Promise<number>;
  getStakes(signal?: AbortSignal): Promise<StakePosition[]>;
  stake(subnetAddress: string, amount: number, signal?: AbortSignal): Promise<string>;
  claimStakingRewards(subnetAddress: string, signal?: AbortSignal): Promise<RewardClaim>;
}

// ============================================================================
// Chain
// ============================================================================

export interface SwapRequest {
  inputMint: string;
  outputMint: string;
  amountLamports: number;
  slippageBps: number;
}

export interface SwapResult {
  signature: string;
  outAmount: string;
}

export interface BridgeRequest {
  depositAddress: string;
  amountLamports: number;
}

export interface SubmitOptions {
  /** Once aborted, the transaction is no longer sent */
  signal?: AbortSignal;
  /** Called as soon as the transaction is sent, before confirmation */
  onSubmitted?: (signature: string) => void;
}

export interface ChainGateway {
  getBalance(address: string): Promise<number>;
  swap(signer: SignerAccess, request: SwapRequest, options?: SubmitOptions): Promise<SwapResult>;
  /** Deposit for the bridge; returns the transfer signature */
  bridgeDeposit(signer: SignerAccess, request: BridgeRequest, options?: SubmitOptions): Promise<string>;
}

/**
 * Builds per-wallet clients bound to the wallet's current proxy
 */
export interface ClientFactory {
  portal(address: string, proxy: string | null): PortalApi;
  chain(proxy: string | null): ChainGateway;
}
