/**
 * Wallet Store
 *
 * Durable JSON document holding every wallet record and the vault header.
 * - Writes to a temp file first, then atomic rename
 * - Keeps 3 backup versions, load falls back to them when the main file is corrupt
 * - Every mutation is persisted before the call returns
 *
 * Mutations are synchronous, so a single wallet's update can never interleave
 * with another's inside this process.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { WalletRecord, VaultHeader } from "../types";
import { createLogger } from "../utils/logger";

const log = createLogger("store");

export const STORE_VERSION = 1;
const BACKUP_COUNT = 3;

interface PersistedStore {
  version: number;
  savedAt: number;
  vault: VaultHeader | null;
  wallets: WalletRecord[];
}

/**
 * Rotate backup files
 * wallets.json -> wallets.json.1 -> wallets.json.2 -> wallets.json.3 (deleted)
 */
function rotateBackups(filePath: string): void {
  const oldest = `${filePath}.${BACKUP_COUNT}`;
  if (fs.existsSync(oldest)) {
    fs.unlinkSync(oldest);
  }

  for (let i = BACKUP_COUNT - 1; i >= 1; i--) {
    const current = `${filePath}.${i}`;
    if (fs.existsSync(current)) {
      fs.renameSync(current, `${filePath}.${i + 1}`);
    }
  }
  fs.copyFileSync(filePath, `${filePath}.1`);
}

const VaultHeaderSchema = z.object({
  version: z.literal(1),
  kdf: z.literal("scrypt"),
  salt: z.string(),
  N: z.number().int(),
  r: z.number().int(),
  p: z.number().int(),
  check: z.string(),
});

const WalletRecordSchema = z.object({
  id: z.number().int().min(1),
  address: z.string().min(1),
  secret: z.string().min(1),
  encrypted: z.boolean(),
  proxy: z.string().nullable(),
  socials: z.object({
    twitter: z.string().optional(),
    discord: z.string().optional(),
  }),
  referralCode: z.string().nullable(),
  inviteCode: z.string().nullable(),
  points: z.number(),
  state: z.enum(["idle", "running", "cooling-down", "disabled"]),
  lastCompletedAt: z.number().nullable(),
  nextEligibleAt: z.number().nullable(),
  failureCount: z.number().int().min(0),
  lastError: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const PersistedStoreSchema = z.object({
  version: z.literal(STORE_VERSION),
  savedAt: z.number(),
  vault: VaultHeaderSchema.nullable(),
  wallets: z.array(WalletRecordSchema),
});

export class WalletStore {
  private wallets: WalletRecord[] = [];
  private byAddress = new Map<string, WalletRecord>();
  private vault: VaultHeader | null = null;

  /**
   * @param filePath - JSON file; null keeps the store in memory only
   */
  constructor(private readonly filePath: string | null) {}

  /**
   * Load from disk, trying backups when the main file is unreadable.
   * Starting with no file at all is an empty store.
   */
  load(): this {
    if (!this.filePath) return this;

    const filesToTry = [this.filePath];
    for (let i = 1; i <= BACKUP_COUNT; i++) {
      filesToTry.push(`${this.filePath}.${i}`);
    }

    for (const file of filesToTry) {
      if (!fs.existsSync(file)) continue;

      try {
        const result = PersistedStoreSchema.safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
        if (!result.success) {
          log.warn("Invalid store structure, skipping", {
            file,
            issue: result.error.issues[0]?.message,
          });
          continue;
        }
        const parsed = result.data;

        this.replaceAll(parsed.wallets, parsed.vault);
        log.debug("Store loaded", {
          file: file === this.filePath ? "current" : `backup ${file.split(".").pop()}`,
          wallets: parsed.wallets.length,
          savedAt: new Date(parsed.savedAt).toISOString(),
        });
        return this;
      } catch (error) {
        log.warn("Failed to parse store file, trying backup", {
          file,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    log.info("No wallet store found, starting empty");
    return this;
  }

  get size(): number {
    return this.wallets.length;
  }

  /** Full scan in insertion order; records are copies */
  list(): WalletRecord[] {
    return this.wallets.map(cloneRecord);
  }

  getByAddress(address: string): WalletRecord | undefined {
    const record = this.byAddress.get(address);
    return record ? cloneRecord(record) : undefined;
  }

  getById(id: number): WalletRecord | undefined {
    const record = this.wallets.find((w) => w.id === id);
    return record ? cloneRecord(record) : undefined;
  }

  nextId(): number {
    return this.wallets.reduce((max, w) => Math.max(max, w.id), 0) + 1;
  }

  insert(record: WalletRecord): void {
    if (this.byAddress.has(record.address)) {
      throw new Error(`Wallet already stored: ${record.address}`);
    }
    const copy = cloneRecord(record);
    this.wallets.push(copy);
    this.byAddress.set(copy.address, copy);
    this.save();
  }

  /**
   * Apply a mutation to one record and persist. Identity fields are restored
   * whatever the mutator does to them.
   */
  update(id: number, mutate: (record: WalletRecord) => void): WalletRecord | undefined {
    const record = this.wallets.find((w) => w.id === id);
    if (!record) return undefined;

    const draft = cloneRecord(record);
    mutate(draft);
    Object.assign(record, draft, { id: record.id, address: record.address });
    this.save();
    return cloneRecord(record);
  }

  /**
   * Apply mutations to many records with a single write
   */
  updateMany(mutate: (record: WalletRecord) => boolean): number {
    let changed = 0;
    for (const record of this.wallets) {
      const draft = cloneRecord(record);
      if (mutate(draft)) {
        Object.assign(record, draft, { id: record.id, address: record.address });
        changed++;
      }
    }
    if (changed > 0) this.save();
    return changed;
  }

  remove(id: number): boolean {
    const index = this.wallets.findIndex((w) => w.id === id);
    if (index < 0) return false;
    const [removed] = this.wallets.splice(index, 1);
    this.byAddress.delete(removed.address);
    this.save();
    return true;
  }

  getVaultHeader(): VaultHeader | null {
    return this.vault ? { ...this.vault } : null;
  }

  setVaultHeader(header: VaultHeader): void {
    this.vault = { ...header };
    this.save();
  }

  /**
   * Swap the whole content in one write (vault re-keying)
   */
  replaceAll(wallets: WalletRecord[], vault: VaultHeader | null, persist = false): void {
    this.wallets = wallets.map(cloneRecord);
    this.byAddress = new Map(this.wallets.map((w) => [w.address, w]));
    this.vault = vault ? { ...vault } : null;
    if (persist) this.save();
  }

  /**
   * Delete every backup file. Used after secrets are rewritten so no older
   * copy keeps the previous form of a key.
   */
  purgeBackups(): void {
    if (!this.filePath) return;
    for (let i = 1; i <= BACKUP_COUNT; i++) {
      const backup = `${this.filePath}.${i}`;
      if (fs.existsSync(backup)) {
        fs.unlinkSync(backup);
      }
    }
  }

  private save(): void {
    if (!this.filePath) return;

    const state: PersistedStore = {
      version: STORE_VERSION,
      savedAt: Date.now(),
      vault: this.vault,
      wallets: this.wallets,
    };

    const tempFile = `${this.filePath}.tmp.${process.pid}`;
    const content = JSON.stringify(state, null, 2);

    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      fs.writeFileSync(tempFile, content, "utf-8");

      if (fs.existsSync(this.filePath)) {
        rotateBackups(this.filePath);
      }

      fs.renameSync(tempFile, this.filePath);
    } catch (error) {
      if (fs.existsSync(tempFile)) {
        fs.unlinkSync(tempFile);
      }
      throw error;
    }
  }
}

function cloneRecord(record: WalletRecord): WalletRecord {
  return { ...record, socials: { ...record.socials } };
}
