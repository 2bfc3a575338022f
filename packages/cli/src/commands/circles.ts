import type { CircleSummary } from '@mnemo/shared';
import type { CommandOptions } from '../utils.js';
import { missingStoreReport, openStore, plural, resolveConfig } from '../utils.js';

export interface CirclesResult {
  found: boolean;
  circles: CircleSummary[];
  report: string;
}

/** mnemo circles: every known circle with its live node count. */
export function circles(opts?: CommandOptions): CirclesResult {
  const config = resolveConfig(opts);
  const store = openStore(config, { readonly: true, now: opts?.now });
  if (!store) {
    return { found: false, circles: [], report: missingStoreReport(config) };
  }

  let list: CircleSummary[];
  try {
    list = store.listCircles();
  } finally {
    store.close();
  }

  const lines = list.map(c => {
    const label = c.name !== c.circleId ? ` (${c.name})` : '';
    return `  ${c.circleId}${label}: ${plural(c.nodeCount, 'node')}`;
  });

  return { found: true, circles: list, report: ['Circles:', ...lines].join('\n') };
}
