/**
 * Operator metadata sources
 *
 * - metadata.json: [{ address, proxy?, twitter?, discord? }]
 * - proxy.txt: one proxy per line, line N belongs to wallet index N
 *
 * Both are merged into the registry with syncMetadata; neither can add or
 * remove wallets.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError, toError } from '../utils/errors';
import { parseProxy, readLines } from '../utils/files';
import { createLogger } from '../utils/logger';
import { MetadataEntry, SyncReport, WalletRegistry } from './wallet-registry';

const log = createLogger('metadata');

const MetadataFileSchema = z.array(
  z.object({
    address: z.string().min(1),
    proxy: z.string().nullable().optional(),
    twitter: z.string().optional(),
    discord: z.string().optional(),
  })
);

export function loadMetadataFile(filePath: string): MetadataEntry[] {
  if (!fs.existsSync(filePath)) return [];

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Metadata file is not valid JSON: ${filePath}`, [toError(error).message]);
  }

  const result = MetadataFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid metadata file: ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data.map((entry) => ({
    address: entry.address,
    proxy: typeof entry.proxy === 'string' ? normaliseProxy(entry.proxy) : entry.proxy,
    twitter: entry.twitter,
    discord: entry.discord,
  }));
}

/**
 * Proxy lines by position. Unparseable lines are skipped, not shifted.
 */
export function proxyEntries(lines: readonly string[]): MetadataEntry[] {
  const entries: MetadataEntry[] = [];
  lines.forEach((line, index) => {
    const proxy = parseProxy(line);
    if (!proxy) {
      log.warn('Skipping invalid proxy line', { line: index + 1 });
      return;
    }
    entries.push({ id: index + 1, proxy });
  });
  return entries;
}

export interface SyncSources {
  metadataFile: string;
  proxiesFile: string;
}

/**
 * Apply proxy.txt first, then metadata.json, so per-address entries win
 */
export function syncFromFiles(registry: WalletRegistry, sources: SyncSources): SyncReport {
  const proxies = registry.syncMetadata(proxyEntries(readLines(sources.proxiesFile)));
  const metadata = registry.syncMetadata(loadMetadataFile(sources.metadataFile));

  const report: SyncReport = {
    updated: proxies.updated + metadata.updated,
    unchanged: proxies.unchanged + metadata.unchanged,
    unknown: [...proxies.unknown, ...metadata.unknown],
  };

  if (report.unknown.length > 0) {
    log.warn('Metadata refers to unknown wallets', { unknown: report.unknown });
  }
  log.info('Metadata synchronised', { updated: report.updated, unchanged: report.unchanged });
  return report;
}

/** Invalid proxies leave the stored one unchanged */
function normaliseProxy(value: string): string | undefined {
  const proxy = parseProxy(value);
  if (!proxy) {
    log.warn('Ignoring invalid proxy in metadata');
    return undefined;
  }
  return proxy;
}
