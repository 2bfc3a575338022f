/**
 * mnemo sweep — One TTL Sweep Now
 *
 * Same eviction the daemon runs on its interval. --ttl overrides the
 * configured TTL for this run only.
 */

import { EventBus } from '@mnemo/shared';
import { PurgeMemory } from '@mnemo/recall';
import type { PurgeOutcome } from '@mnemo/recall';
import type { CommandOptions } from '../utils.js';
import { missingStoreReport, openStore, plural, resolveConfig } from '../utils.js';

export interface SweepOptions extends CommandOptions {
  ttlSeconds?: number;
}

export interface SweepResult {
  ok: boolean;
  deleted: number;
  report: string;
}

export async function sweep(opts?: SweepOptions): Promise<SweepResult> {
  const config = resolveConfig(opts);
  const ttlSeconds = opts?.ttlSeconds ?? config.ttlSeconds;

  const store = openStore(config, { readonly: false, now: opts?.now });
  if (!store) {
    return { ok: true, deleted: 0, report: missingStoreReport(config) };
  }

  let outcome: PurgeOutcome;
  try {
    outcome = await new PurgeMemory(store, new EventBus(), { ttlSeconds }).expired();
  } finally {
    store.close();
  }

  if (!outcome.ok) {
    return { ok: false, deleted: 0, report: `Sweep failed: ${outcome.error.message}` };
  }
  return {
    ok: true,
    deleted: outcome.deleted,
    report: `Expired ${plural(outcome.deleted, 'node')} older than ${ttlSeconds}s.`,
  };
}
