#!/usr/bin/env node
/**
 * Farmhand CLI
 *
 * Usage: farmhand <command> [options]
 */

// Load .env file first
import * as dotenv from "dotenv";
dotenv.config();

import * as readline from "readline";
import { Env, Paths, RunConfig, loadEnv, loadSettings, resolvePaths } from "./config";
import { prepareRun } from "./coordinator";
import { JournalEntry, JournalParseError, RunJournal, readJournalFile, validateEntries } from "./journal/run-journal";
import { syncFromFiles } from "./registry/metadata-sync";
import { describeSelection } from "./registry/selection";
import { WalletRegistry } from "./registry/wallet-registry";
import { AuthError, ConfigError, toError } from "./utils/errors";
import { maskProxy, setGlobalLogLevel } from "./utils/logger";
import { CredentialVault } from "./vault/credential-vault";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_AUTH = 3;

const COMMANDS = [
  "import",
  "sync",
  "run",
  "status",
  "disable",
  "enable",
  "remove",
  "encrypt",
  "rekey",
  "verify-journal",
  "help",
] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  index?: number;
  once: boolean;
  verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { command: "help", once: false, verbose: false };
  const positional: string[] = [];

  for (const arg of argv) {
    switch (arg) {
      case "--once":
        result.once = true;
        break;
      case "--verbose":
      case "-v":
        result.verbose = true;
        break;
      case "--help":
      case "-h":
        result.command = "help";
        return result;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [command, index] = positional;
  if (command === undefined) return result;
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }
  result.command = command;

  if (command === "disable" || command === "enable" || command === "remove") {
    const parsed = Number(index);
    if (index === undefined || !Number.isInteger(parsed) || parsed < 1) {
      throw new UsageError(`${command} needs a wallet index (>= 1)`);
    }
    result.index = parsed;
  }
  if (result.once && command !== "run") {
    throw new UsageError("--once only applies to run");
  }

  return result;
}

function printHelp(): void {
  console.log(`
Farmhand - Solana wallet farming orchestrator

Usage: farmhand <command> [options]

Commands:
  import            Import keys from private_keys.txt (proxies by line from proxy.txt)
  sync              Apply proxy.txt and metadata.json to stored wallets
  run [--once]      Run the farming loop (--once: every eligible wallet once, then exit)
  status            Show every wallet and its run state
  disable <index>   Exclude a wallet from runs
  enable <index>    Re-admit a disabled wallet
  remove <index>    Delete a wallet and its credential
  encrypt           Encrypt keys stored in plaintext
  rekey             Re-encrypt the vault under a new password
  verify-journal    Check the run journal hash chain
  help              Show this help message

Options:
  --verbose, -v     Debug logging (overrides log_level)

Environment Variables:
  FARMHAND_DATA_DIR   Data directory (default: ./data)
  FARMHAND_SETTINGS   Settings file (default: <data>/settings.json)
  FARMHAND_PASSWORD   Vault password (prompted when absent)
  RPC_URL             Solana RPC endpoint
  PORTAL_API_URL      Ecosystem portal API
  SWAP_API_URL        Swap quote API
  BRIDGE_API_URL      Bridge deposit API
`);
}

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function passwordFor(env: Env, required: boolean): Promise<string | undefined> {
  if (!required) return undefined;
  if (env.FARMHAND_PASSWORD) return env.FARMHAND_PASSWORD;
  const password = await prompt("Vault password: ");
  return password.length > 0 ? password : undefined;
}

async function newPassword(): Promise<string> {
  const first = await prompt("New vault password: ");
  const second = await prompt("Repeat new vault password: ");
  if (first.length === 0) {
    throw new UsageError("Password must not be empty");
  }
  if (first !== second) {
    throw new UsageError("Passwords do not match");
  }
  return first;
}

interface Workspace {
  env: Env;
  paths: Paths;
  config: RunConfig;
  registry: WalletRegistry;
}

/**
 * Every command but status holds the store lock while it runs
 */
function openWorkspace(verbose: boolean, exclusive: boolean): Workspace {
  const env = loadEnv();
  const paths = resolvePaths(env);
  const config = loadSettings(paths.settings);
  setGlobalLogLevel(verbose ? "debug" : config.logLevel);
  const registry = WalletRegistry.open(paths.store, { showAddressInLogs: config.showAddressInLogs, exclusive });
  return { env, paths, config, registry };
}

function formatTime(ms: number | null): string {
  return ms === null ? "-" : new Date(ms).toISOString();
}

function printStatus({ registry, config }: Workspace): void {
  const wallets = registry.list();
  console.log(`Wallets: ${wallets.length} | selection: ${describeSelection(config.selection)} | threads: ${config.threads}`);
  console.log("");

  for (const w of wallets) {
    const columns = [
      String(w.id).padStart(4),
      config.showAddressInLogs ? w.address.padEnd(44) : "",
      w.state.padEnd(12),
      `pts ${w.points}`.padEnd(10),
      `next ${formatTime(w.nextEligibleAt)}`,
      `proxy ${maskProxy(w.proxy)}`,
      w.failureCount > 0 ? `failures ${w.failureCount}: ${w.lastError ?? ""}` : "",
    ];
    console.log(columns.filter((c) => c.length > 0).join("  "));
  }
}

async function execute(args: CliArgs): Promise<number> {
  if (args.command === "help") {
    printHelp();
    return EXIT_OK;
  }

  if (args.command === "verify-journal") {
    const env = loadEnv();
    const paths = resolvePaths(env);
    let entries: JournalEntry[];
    try {
      entries = readJournalFile(paths.journal);
    } catch (error) {
      if (!(error instanceof JournalParseError)) throw error;
      console.error(`Journal unreadable: ${error.message}`);
      return EXIT_FAILURE;
    }
    const result = validateEntries(entries);
    if (result.valid) {
      console.log(`Journal OK: ${result.entriesChecked} entries`);
      return EXIT_OK;
    }
    console.error(`Journal corrupted at entry ${result.corruptionIndex}: ${result.corruptionDetails ?? "unknown"}`);
    return EXIT_FAILURE;
  }

  if (args.command === "run") {
    return runCommand(args);
  }

  const workspace = openWorkspace(args.verbose, args.command !== "status");
  try {
    return await runStoreCommand(args, workspace);
  } finally {
    workspace.registry.close();
  }
}

async function runStoreCommand(args: CliArgs, workspace: Workspace): Promise<number> {
  const { env, paths, config, registry } = workspace;
  const vault = new CredentialVault(registry, { encryption: config.encryption });

  switch (args.command) {
    case "import": {
      const handle = vault.unlock(await passwordFor(env, vault.requiresPassword()));
      try {
        const report = handle.importPlaintextKeys({ keysFile: paths.privateKeys, proxiesFile: paths.proxies });
        new RunJournal({ file: paths.journal }).initialize().append("import", { ...report });
        console.log(`Imported ${report.imported}, duplicates ${report.duplicates}, invalid ${report.invalid}`);
      } finally {
        handle.lock();
      }
      return EXIT_OK;
    }

    case "sync": {
      const report = syncFromFiles(registry, { metadataFile: paths.metadata, proxiesFile: paths.proxies });
      console.log(`Updated ${report.updated}, unchanged ${report.unchanged}, unknown ${report.unknown.length}`);
      return EXIT_OK;
    }

    case "status":
      printStatus(workspace);
      return EXIT_OK;

    case "disable":
    case "enable":
    case "remove": {
      const index = args.index ?? 0;
      if (args.command === "disable") registry.disable(index);
      else if (args.command === "enable") registry.enable(index);
      else registry.remove(index);
      console.log(`Wallet ${index}: ${args.command}d`);
      return EXIT_OK;
    }

    case "encrypt": {
      const password = await passwordFor(env, true);
      if (!password) throw new AuthError("Vault password required");
      const count = vault.encryptExisting(password);
      console.log(`Encrypted ${count} plaintext key(s)`);
      return EXIT_OK;
    }

    case "rekey": {
      const current = await passwordFor(env, true);
      if (!current) throw new AuthError("Vault password required");
      const count = vault.rekey(current, await newPassword());
      console.log(`Re-encrypted ${count} key(s)`);
      return EXIT_OK;
    }

    default:
      throw new UsageError(`Unhandled command: ${args.command}`);
  }
}

async function runCommand(args: CliArgs): Promise<number> {
  const env = loadEnv();
  const paths = resolvePaths(env);
  const config = loadSettings(paths.settings);
  const reader = new CredentialVault(WalletRegistry.open(paths.store), { encryption: config.encryption });
  const password = await passwordFor(env, reader.requiresPassword());

  const prepared = prepareRun(env, { password, once: args.once });
  if (args.verbose) setGlobalLogLevel("debug");
  const { coordinator, vault } = prepared;

  let signals = 0;
  const shutdown = (signal: string) => {
    signals++;
    if (signals > 1) {
      console.log(`\nReceived ${signal} again, exiting now`);
      process.exit(130);
    }
    console.log(`\nReceived ${signal}, finishing in-flight actions... (again to force)`);
    coordinator.stop();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  try {
    const summary = await coordinator.run();
    console.log(
      `\nRun finished (${summary.reason}): ${summary.completed} completed, ${summary.failed} failed, ` +
        `${summary.interrupted} interrupted | actions ${summary.actions.success} ok, ` +
        `${summary.actions.failed} failed, ${summary.actions.skipped} skipped`
    );
    return EXIT_OK;
  } finally {
    vault.lock();
    prepared.registry.close();
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError || error instanceof ConfigError) return EXIT_USAGE;
  if (error instanceof AuthError) return EXIT_AUTH;
  return EXIT_FAILURE;
}

async function main(): Promise<void> {
  let code: number;
  try {
    code = await execute(parseArgs(process.argv.slice(2)));
  } catch (error) {
    const err = toError(error);
    console.error(`Error: ${err.message}`);
    if (error instanceof UsageError) {
      console.error("Run with --help for usage information");
    }
    code = exitCodeFor(error);
  }
  process.exit(code);
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Fatal error:", error);
    process.exit(EXIT_FAILURE);
  });
}
