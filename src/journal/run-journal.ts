/**
 * Run Journal
 *
 * Append-only JSONL audit trail of wallet runs. Each entry carries the
 * SHA-256 of the previous one, so edits to past lines break the chain.
 *
 * Genesis -> Entry1 -> Entry2 -> ... -> EntryN
 *
 * Nothing here holds key material: entries name wallets by index and address.
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { z } from "zod";
import { createLogger, Logger } from "../utils/logger";
import { Clock, systemClock } from "../utils/clock";
import { writeFileAtomic } from "../utils/files";

const GENESIS_HASH = "0".repeat(64);

export type JournalEvent =
  | "run_start"
  | "run_stop"
  | "wallet_completed"
  | "wallet_failed"
  | "wallet_interrupted"
  | "import";

export type JournalValue = string | number | boolean | null;

export interface JournalEntry {
  sequence: number;
  prevHash: string;
  hash: string;
  timestamp: number;
  event: JournalEvent;
  data: Record<string, JournalValue>;
}

const JournalEntrySchema = z.object({
  sequence: z.number().int(),
  prevHash: z.string(),
  hash: z.string(),
  timestamp: z.number(),
  event: z.enum(["run_start", "run_stop", "wallet_completed", "wallet_failed", "wallet_interrupted", "import"]),
  data: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
});

export interface ValidationResult {
  valid: boolean;
  entriesChecked: number;
  corruptionIndex?: number;
  corruptionDetails?: string;
}

export interface RunJournalConfig {
  /** JSONL file; null keeps entries in memory only */
  file: string | null;
  maxEntriesInMemory?: number;
  clock?: Clock;
}

export function computeEntryHash(entry: Omit<JournalEntry, "hash">): string {
  const data = JSON.stringify({
    sequence: entry.sequence,
    prevHash: entry.prevHash,
    timestamp: entry.timestamp,
    event: entry.event,
    data: entry.data,
  });
  return crypto.createHash("sha256").update(data).digest("hex");
}

/**
 * Check hashes and prevHash links from genesis
 */
export function validateEntries(entries: readonly JournalEntry[]): ValidationResult {
  let prevHash = GENESIS_HASH;

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];

    if (entry.prevHash !== prevHash) {
      return {
        valid: false,
        entriesChecked: i,
        corruptionIndex: entry.sequence,
        corruptionDetails: `prevHash mismatch at entry ${entry.sequence}`,
      };
    }

    const { hash, ...withoutHash } = entry;
    const computed = computeEntryHash(withoutHash);
    if (hash !== computed) {
      return {
        valid: false,
        entriesChecked: i,
        corruptionIndex: entry.sequence,
        corruptionDetails: `Hash mismatch at entry ${entry.sequence}: expected ${computed.slice(0, 12)}..., got ${hash.slice(0, 12)}...`,
      };
    }

    prevHash = entry.hash;
  }

  return { valid: true, entriesChecked: entries.length };
}

export class JournalParseError extends Error {
  constructor(message: string, public readonly line: number) {
    super(message);
    this.name = "JournalParseError";
  }
}

function parseLine(line: string, lineNumber: number): JournalEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new JournalParseError(`Failed to parse journal entry at line ${lineNumber}`, lineNumber);
  }
  const result = JournalEntrySchema.safeParse(parsed);
  if (!result.success) {
    throw new JournalParseError(`Malformed journal entry at line ${lineNumber}`, lineNumber);
  }
  return result.data;
}

export function readJournalFile(file: string): JournalEntry[] {
  if (!fs.existsSync(file)) return [];

  const lines = fs.readFileSync(file, "utf-8").split("\n").filter(Boolean);
  return lines.map((line, i) => parseLine(line, i + 1));
}

export interface LoadedJournal {
  entries: JournalEntry[];
  /** Unparseable last line, left by a write cut short */
  tornTail: string | null;
}

/**
 * Like readJournalFile, but an unparseable last line is returned apart
 * instead of failing the whole read
 */
export function loadJournalFile(file: string): LoadedJournal {
  if (!fs.existsSync(file)) return { entries: [], tornTail: null };

  const lines = fs.readFileSync(file, "utf-8").split("\n").filter(Boolean);
  const entries: JournalEntry[] = [];

  for (let i = 0; i < lines.length; i++) {
    try {
      entries.push(parseLine(lines[i], i + 1));
    } catch (error) {
      if (i === lines.length - 1) {
        return { entries, tornTail: lines[i] };
      }
      throw error;
    }
  }
  return { entries, tornTail: null };
}

export class RunJournal {
  private readonly file: string | null;
  private readonly maxEntriesInMemory: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private recentEntries: JournalEntry[] = [];
  private sequence = 0;
  private latestHash = GENESIS_HASH;

  constructor(config: RunJournalConfig) {
    this.file = config.file;
    this.maxEntriesInMemory = config.maxEntriesInMemory ?? 1000;
    this.clock = config.clock ?? systemClock;
    this.logger = createLogger("journal");
  }

  /**
   * Load the existing chain and continue it. Damage never stops a run:
   * - a torn last line moves to <file>.torn
   * - an unreadable file moves aside and a new chain starts
   * - a broken hash chain is logged and left for verify-journal
   */
  initialize(): this {
    if (!this.file) return this;

    const dir = path.dirname(this.file);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    let loaded: LoadedJournal;
    try {
      loaded = loadJournalFile(this.file);
    } catch (error) {
      if (!(error instanceof JournalParseError)) throw error;
      const aside = `${this.file}.corrupt.${this.clock.now()}`;
      fs.renameSync(this.file, aside);
      this.logger.warn("Unreadable journal moved aside, starting a new chain", { file: aside, error: error.message });
      loaded = { entries: [], tornTail: null };
    }

    const { entries, tornTail } = loaded;
    if (tornTail !== null) {
      this.quarantineTornTail(this.file, entries, tornTail);
    }

    const validation = validateEntries(entries);
    if (!validation.valid) {
      this.logger.warn("Journal hash chain is broken, run verify-journal for details", {
        index: validation.corruptionIndex ?? null,
        details: validation.corruptionDetails ?? null,
      });
    }

    const last = entries[entries.length - 1];
    if (last) {
      this.sequence = last.sequence;
      this.latestHash = last.hash;
    }
    this.recentEntries = entries.slice(-this.maxEntriesInMemory);
    this.logger.debug(`Journal loaded: ${entries.length} entries`);
    return this;
  }

  private quarantineTornTail(file: string, entries: readonly JournalEntry[], tornTail: string): void {
    fs.appendFileSync(`${file}.torn`, tornTail + "\n");
    writeFileAtomic(file, entries.map((entry) => JSON.stringify(entry) + "\n").join(""));
    this.logger.warn("Dropped a torn journal line left by an interrupted write", { file: `${file}.torn` });
  }

  append(event: JournalEvent, data: Record<string, JournalValue>): JournalEntry {
    const entry: Omit<JournalEntry, "hash"> = {
      sequence: this.sequence + 1,
      prevHash: this.latestHash,
      timestamp: this.clock.now(),
      event,
      data,
    };
    const fullEntry: JournalEntry = { ...entry, hash: computeEntryHash(entry) };

    if (this.file) {
      fs.appendFileSync(this.file, JSON.stringify(fullEntry) + "\n");
    }

    this.sequence = fullEntry.sequence;
    this.latestHash = fullEntry.hash;
    this.recentEntries.push(fullEntry);
    if (this.recentEntries.length > this.maxEntriesInMemory) {
      this.recentEntries.shift();
    }

    this.logger.debug(`Appended entry #${fullEntry.sequence}`, { event, hash: fullEntry.hash.slice(0, 12) });
    return fullEntry;
  }

  /**
   * Full check of the file on disk (or the in-memory entries)
   */
  validate(): ValidationResult {
    return validateEntries(this.file ? readJournalFile(this.file) : this.recentEntries);
  }

  getRecentEntries(count?: number): JournalEntry[] {
    if (!count) return [...this.recentEntries];
    return this.recentEntries.slice(-count);
  }

  getLatestHash(): string {
    return this.latestHash;
  }
}
