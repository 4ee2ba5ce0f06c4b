/**
 * Farmhand - Solana wallet farming orchestrator
 *
 * Library surface; the operator entry point is ./cli
 */

export * from './types';
export { parseSettings, loadSettings, loadEnv, resolvePaths, describeEnv } from './config';
export type { RunConfig, Env, Paths, Bounds, WalletSelection, ActionKind, Settings } from './config';

export { RunCoordinator, prepareRun } from './coordinator';
export type { RunCoordinatorDeps, PrepareRunOptions, PreparedRun } from './coordinator';

export { WalletRegistry, InvalidTransitionError } from './registry/wallet-registry';
export type { RetryPolicy, NewWallet, MetadataEntry, SyncReport } from './registry/wallet-registry';
export { WalletStore } from './registry/wallet-store';
export { StoreLock, StoreLockedError } from './registry/store-lock';
export { isSelected, describeSelection } from './registry/selection';
export { ReferralPool } from './registry/referral-pool';
export { loadMetadataFile, syncFromFiles } from './registry/metadata-sync';

export { CredentialVault, VaultHandle } from './vault/credential-vault';
export type { ImportReport, ImportSource } from './vault/credential-vault';
export { parseSecretKey, InvalidKeyError } from './vault/key-import';

export { RunJournal, JournalParseError, loadJournalFile, readJournalFile, validateEntries } from './journal/run-journal';
export type { JournalEntry, JournalEvent } from './journal/run-journal';

export { Scheduler } from './scheduler/scheduler';
export type { WalletExecutor } from './scheduler/scheduler';
export { WorkerPool, PoolFullError } from './scheduler/worker-pool';

export { ActionPipeline } from './pipeline/action-pipeline';
export { buildPipeline } from './pipeline/pipeline-builder';
export { WalletRunner } from './pipeline/wallet-runner';
export type { ActionUnit, ActionContext, UnitOutcome, PipelineResult } from './pipeline/types';

export type { PortalApi, ChainGateway, ClientFactory, PortalProfile, SocialStatus, StakePosition, SubmitOptions } from './actions/types';
export { HttpPortalApi } from './actions/portal-api';
export { SolanaChainGateway } from './actions/chain-gateway';
export { createClientFactory } from './actions/client-factory';

export * from './utils/errors';
export { createLogger, setGlobalLogLevel, setGlobalLogSink } from './utils/logger';
export type { LogLevel } from './utils/logger';
export { systemClock } from './utils/clock';
export type { Clock } from './utils/clock';
export { createSeededRandom, mathRandom } from './utils/random';
export type { RandomSource } from './utils/random';
