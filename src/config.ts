/**
 * Farmhand configuration
 *
 * Two sources, both validated with Zod:
 * - settings.json: run behaviour (threads, selection, pauses, module counts)
 * - environment / .env: paths, endpoints and the vault password
 *
 * The parsed result is a deep-frozen RunConfig handed to the coordinator and
 * from there to every component at construction.
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, toError } from './utils/errors';
import { LogLevel, toLogLevel } from './utils/logger';
import { writeFileAtomic } from './utils/files';

// ============================================================================
// Settings schema
// ============================================================================

const BoundsSchema = z
  .object({
    min: z.number().int().min(0),
    max: z.number().int().min(0),
  })
  .refine((b) => b.min <= b.max, { message: 'min must not exceed max' });

const PercentSchema = z
  .object({
    min: z.number().min(0).max(100),
    max: z.number().min(0).max(100),
  })
  .refine((b) => b.min <= b.max, { message: 'min must not exceed max' });

const ActionTogglesSchema = z.object({
  faucet: z.boolean().default(true),
  quiz: z.boolean().default(true),
  swap: z.boolean().default(true),
  bridge: z.boolean().default(true),
  mint: z.boolean().default(true),
  referral: z.boolean().default(true),
  ai_dialog: z.boolean().default(true),
  social: z.boolean().default(false),
  staking: z.boolean().default(false),
});

export const SettingsSchema = z.object({
  private_key_encryption: z.boolean().default(true),
  threads: z.number().int().min(1).max(256).default(1),
  range_wallets_to_run: z
    .tuple([z.number().int().min(0), z.number().int().min(0)])
    .refine(([start, end]) => start <= end, { message: 'range start must not exceed range end' })
    .refine(([start, end]) => (start === 0) === (end === 0), {
      message: 'use [0, 0] to disable the range, otherwise both bounds must be >= 1',
    })
    .default([0, 0]),
  exact_wallets_to_run: z.array(z.number().int().min(1)).default([]),
  log_level: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']).default('INFO'),
  show_wallet_address_logs: z.boolean().default(true),
  shuffle_wallets: z.boolean().default(false),

  random_pause_wallet_after_completion: BoundsSchema.default({ min: 43200, max: 86400 }),
  random_pause_between_actions: BoundsSchema.default({ min: 5, max: 60 }),
  random_pause_start_wallet: BoundsSchema.default({ min: 0, max: 600 }),

  swaps_count: BoundsSchema.default({ min: 1, max: 3 }),
  swaps_percent: PercentSchema.default({ min: 5, max: 20 }),
  bridges_count: BoundsSchema.default({ min: 0, max: 1 }),
  bridge_percent: PercentSchema.default({ min: 5, max: 10 }),
  ai_dialogs_count: BoundsSchema.default({ min: 1, max: 3 }),
  stake_amount: BoundsSchema.default({ min: 1, max: 5 }),
  staking_subnets: z.array(z.string().min(1)).default([]),

  invite_codes: z.array(z.string().min(1)).default([]),
  actions: ActionTogglesSchema.default({}),

  action_timeout_seconds: z.number().int().min(1).max(3600).default(300),
  action_retries: z.number().int().min(0).max(10).default(3),
  failure_retry_delay: BoundsSchema.default({ min: 300, max: 21600 }),
  rescan_interval_seconds: z.number().int().min(1).default(300),

  min_balance_sol: z.number().min(0).default(0.01),
  swap_output_mint: z.string().default('EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v'),
  bridge_deposit_address: z.string().nullable().default(null),
  bridge_destination_chain_id: z.number().int().min(1).default(1),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ============================================================================
// Environment schema
// ============================================================================

export const EnvSchema = z.object({
  FARMHAND_DATA_DIR: z.string().min(1).default('./data'),
  FARMHAND_SETTINGS: z.string().min(1).optional(),
  FARMHAND_PASSWORD: z.string().min(1).optional(),
  RPC_URL: z.string().url().default('https://api.devnet.solana.com'),
  PORTAL_API_URL: z.string().url().default('http://localhost:8080/api'),
  SWAP_API_URL: z.string().url().default('https://quote-api.jup.ag/v6'),
  BRIDGE_API_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

// ============================================================================
// RunConfig
// ============================================================================

export interface Bounds {
  readonly min: number;
  readonly max: number;
}

export type ActionKind =
  | 'onboarding'
  | 'referral'
  | 'quiz'
  | 'faucet'
  | 'swap'
  | 'bridge'
  | 'mint'
  | 'ai_dialog'
  | 'social'
  | 'staking';

export interface WalletSelection {
  /** Inclusive [start, end]; null when the range is [0, 0] */
  readonly range: readonly [number, number] | null;
  readonly exact: readonly number[];
}

export interface RunConfig {
  readonly encryption: boolean;
  readonly threads: number;
  readonly selection: WalletSelection;
  readonly logLevel: LogLevel;
  readonly showAddressInLogs: boolean;
  /** Admit eligible wallets in random order instead of by id */
  readonly shuffleWallets: boolean;
  readonly cooldownSeconds: Bounds;
  readonly pacingSeconds: Bounds;
  readonly startJitterSeconds: Bounds;
  readonly swapsCount: Bounds;
  readonly swapsPercent: Bounds;
  readonly bridgesCount: Bounds;
  readonly bridgePercent: Bounds;
  readonly aiDialogsCount: Bounds;
  /** Whole portal tokens per stake */
  readonly stakeAmount: Bounds;
  readonly stakingSubnets: readonly string[];
  readonly inviteCodes: readonly string[];
  readonly enabledActions: Readonly<Record<Exclude<ActionKind, 'onboarding'>, boolean>>;
  readonly actionTimeoutMs: number;
  readonly actionRetries: number;
  readonly failureRetryDelaySeconds: Bounds;
  readonly rescanIntervalMs: number;
  readonly minBalanceSol: number;
  readonly swapOutputMint: string;
  readonly bridgeDepositAddress: string | null;
  readonly bridgeDestinationChainId: number;
}

export interface Paths {
  readonly dataDir: string;
  readonly settings: string;
  readonly store: string;
  readonly journal: string;
  readonly privateKeys: string;
  readonly proxies: string;
  readonly reserveProxies: string;
  readonly metadata: string;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate raw settings (already parsed JSON) into a frozen RunConfig
 */
export function parseSettings(raw: unknown): RunConfig {
  const result = SettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError('Invalid settings', formatIssues(result.error));
  }
  return toRunConfig(result.data);
}

export function toRunConfig(s: Settings): RunConfig {
  const [start, end] = s.range_wallets_to_run;

  return deepFreeze<RunConfig>({
    encryption: s.private_key_encryption,
    threads: s.threads,
    selection: {
      range: start === 0 && end === 0 ? null : [start, end],
      exact: [...new Set(s.exact_wallets_to_run)].sort((a, b) => a - b),
    },
    logLevel: toLogLevel(s.log_level),
    showAddressInLogs: s.show_wallet_address_logs,
    shuffleWallets: s.shuffle_wallets,
    cooldownSeconds: { ...s.random_pause_wallet_after_completion },
    pacingSeconds: { ...s.random_pause_between_actions },
    startJitterSeconds: { ...s.random_pause_start_wallet },
    swapsCount: { ...s.swaps_count },
    swapsPercent: { ...s.swaps_percent },
    bridgesCount: { ...s.bridges_count },
    bridgePercent: { ...s.bridge_percent },
    aiDialogsCount: { ...s.ai_dialogs_count },
    stakeAmount: { ...s.stake_amount },
    stakingSubnets: [...s.staking_subnets],
    inviteCodes: [...s.invite_codes],
    enabledActions: {
      referral: s.actions.referral,
      quiz: s.actions.quiz,
      faucet: s.actions.faucet,
      swap: s.actions.swap,
      bridge: s.actions.bridge,
      mint: s.actions.mint,
      ai_dialog: s.actions.ai_dialog,
      social: s.actions.social,
      staking: s.actions.staking,
    },
    actionTimeoutMs: s.action_timeout_seconds * 1000,
    actionRetries: s.action_retries,
    failureRetryDelaySeconds: { ...s.failure_retry_delay },
    rescanIntervalMs: s.rescan_interval_seconds * 1000,
    minBalanceSol: s.min_balance_sol,
    swapOutputMint: s.swap_output_mint,
    bridgeDepositAddress: s.bridge_deposit_address,
    bridgeDestinationChainId: s.bridge_destination_chain_id,
  });
}

/**
 * Read settings.json. A missing file is created with defaults so operators
 * have something to edit.
 */
export function loadSettings(filePath: string): RunConfig {
  if (!fs.existsSync(filePath)) {
    const defaults = SettingsSchema.parse({});
    writeFileAtomic(filePath, `${JSON.stringify(defaults, null, 2)}\n`);
    return toRunConfig(defaults);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Settings file is not valid JSON: ${filePath}`, [toError(error).message]);
  }
  return parseSettings(raw);
}

/**
 * Validate environment variables
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError('Invalid environment configuration', formatIssues(result.error));
  }
  return result.data;
}

export function resolvePaths(env: Env): Paths {
  const dataDir = path.resolve(env.FARMHAND_DATA_DIR);
  return deepFreeze<Paths>({
    dataDir,
    settings: env.FARMHAND_SETTINGS ? path.resolve(env.FARMHAND_SETTINGS) : path.join(dataDir, 'settings.json'),
    store: path.join(dataDir, 'wallets.json'),
    journal: path.join(dataDir, 'journal.jsonl'),
    privateKeys: path.join(dataDir, 'private_keys.txt'),
    proxies: path.join(dataDir, 'proxy.txt'),
    reserveProxies: path.join(dataDir, 'reserve_proxy.txt'),
    metadata: path.join(dataDir, 'metadata.json'),
  });
}

/**
 * Log validated environment with secrets redacted
 */
export function describeEnv(env: Env): Record<string, unknown> {
  return {
    ...env,
    FARMHAND_PASSWORD: env.FARMHAND_PASSWORD ? '***REDACTED***' : undefined,
  };
}
