/**
 * mnemo purge — Forget a Circle or Everything
 *
 *   mnemo purge --circle <id>
 *   mnemo purge --all
 */

import { EventBus } from '@mnemo/shared';
import { PurgeMemory } from '@mnemo/recall';
import type { PurgeOutcome } from '@mnemo/recall';
import type { CommandOptions } from '../utils.js';
import { missingStoreReport, openStore, plural, resolveConfig } from '../utils.js';

export interface PurgeOptions extends CommandOptions {
  circleId?: string;
  all?: boolean;
}

export interface PurgeResult {
  ok: boolean;
  deleted: number;
  report: string;
}

export async function purge(opts: PurgeOptions): Promise<PurgeResult> {
  if (Boolean(opts.all) === Boolean(opts.circleId)) {
    return { ok: false, deleted: 0, report: 'Specify exactly one of --circle <id> or --all.' };
  }

  const config = resolveConfig(opts);
  const store = openStore(config, { readonly: false, now: opts.now });
  if (!store) {
    return { ok: true, deleted: 0, report: missingStoreReport(config) };
  }

  let outcome: PurgeOutcome;
  try {
    const purger = new PurgeMemory(store, new EventBus(), { ttlSeconds: config.ttlSeconds });
    outcome = opts.circleId ? await purger.circle(opts.circleId) : await purger.all();
  } finally {
    store.close();
  }

  if (!outcome.ok) {
    return { ok: false, deleted: 0, report: `Purge failed: ${outcome.error.message}` };
  }
  const target = outcome.circleId ? `circle '${outcome.circleId}'` : 'all circles';
  return {
    ok: true,
    deleted: outcome.deleted,
    report: `Purged ${plural(outcome.deleted, 'node')} from ${target}.`,
  };
}
