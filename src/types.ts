/**
 * Farmhand shared types
 */

// ============================================================================
// Wallets
// ============================================================================

export type RunState = 'idle' | 'running' | 'cooling-down' | 'disabled';

export interface SocialHandles {
  twitter?: string;
  discord?: string;
}

export interface WalletRecord {
  /** 1-based insertion index, the number used by range/exact selection */
  id: number;
  address: string;
  /** Vault envelope when encrypted, base58 secret key otherwise */
  secret: string;
  encrypted: boolean;
  proxy: string | null;
  socials: SocialHandles;
  /** Invite code this wallet registers with */
  referralCode: string | null;
  /** The wallet's own invite code, as reported by the portal */
  inviteCode: string | null;
  points: number;
  state: RunState;
  lastCompletedAt: number | null;
  nextEligibleAt: number | null;
  failureCount: number;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

/**
 * What action units may see of a wallet. No secret material.
 */
export interface WalletView {
  readonly id: number;
  readonly address: string;
  readonly proxy: string | null;
  readonly referralCode: string | null;
  readonly socials: Readonly<SocialHandles>;
  readonly tag: string;
}

// ============================================================================
// Vault
// ============================================================================

export interface VaultHeader {
  version: 1;
  kdf: 'scrypt';
  salt: string;
  N: number;
  r: number;
  p: number;
  /** Envelope of a known plaintext, used to verify the password */
  check: string;
}

// ============================================================================
// Run outcomes
// ============================================================================

export type WalletOutcome = 'completed' | 'failed' | 'interrupted';

export interface WalletRunResult {
  walletId: number;
  address: string;
  outcome: WalletOutcome;
  actions: ActionTally;
  error?: string;
  durationMs: number;
}

export interface ActionTally {
  success: number;
  failed: number;
  skipped: number;
}

export interface RunSummary {
  startedAt: number;
  finishedAt: number;
  completed: number;
  failed: number;
  interrupted: number;
  actions: ActionTally;
  reason: 'stopped' | 'single-pass' | 'nothing-eligible';
}

export function emptyTally(): ActionTally {
  return { success: 0, failed: 0, skipped: 0 };
}
