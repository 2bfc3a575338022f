/**
 * mnemo status — Store Summary
 *
 * Read-only: opens the database without write access, so it is safe to run
 * while the daemon holds the store open.
 */

import type { StoreStats } from '@mnemo/shared';
import type { CommandOptions } from '../utils.js';
import { missingStoreReport, openStore, plural, resolveConfig } from '../utils.js';

export interface StatusResult {
  found: boolean;
  dbPath: string;
  stats: StoreStats | null;
  report: string;
}

export function status(opts?: CommandOptions): StatusResult {
  const config = resolveConfig(opts);
  const store = openStore(config, { readonly: true, now: opts?.now });
  if (!store) {
    return { found: false, dbPath: config.dbPath, stats: null, report: missingStoreReport(config) };
  }

  let stats: StoreStats;
  try {
    stats = store.stats();
  } finally {
    store.close();
  }

  const models = Object.entries(stats.models)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([model, count]) => `    ${model}: ${plural(count, 'node')}`);

  const report = [
    '',
    '=== Mnemo Status ===',
    '',
    `  Store:       ${config.dbPath}`,
    `  Nodes:       ${stats.totalNodes}`,
    `  Circles:     ${stats.circleCount}`,
    `  Oldest:      ${stats.oldestCreatedAt ?? '-'}`,
    `  Newest:      ${stats.newestCreatedAt ?? '-'}`,
    `  TTL:         ${config.ttlSeconds}s (sweep every ${config.sweepIntervalSeconds}s)`,
    '',
    '  Models:',
    ...(models.length > 0 ? models : ['    (none)']),
    '',
  ].join('\n');

  return { found: true, dbPath: config.dbPath, stats, report };
}
