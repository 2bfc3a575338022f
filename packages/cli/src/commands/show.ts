/**
 * mnemo show — Dump Recent Memories
 *
 * Newest first, up to --limit nodes (default 100), optionally one circle.
 * Content is shortened to a single line unless --full is given, which also
 * prints ids, expiry, vector size and metadata.
 */

import { preview } from '@mnemo/shared';
import type { MemoryNode } from '@mnemo/shared';
import type { CommandOptions } from '../utils.js';
import { missingStoreReport, openStore, plural, resolveConfig } from '../utils.js';

export const DEFAULT_SHOW_LIMIT = 100;
const PREVIEW_CHARS = 80;

export interface ShowOptions extends CommandOptions {
  full?: boolean;
  circleId?: string;
  limit?: number;
}

export interface ShowResult {
  found: boolean;
  nodes: MemoryNode[];
  report: string;
}

export function show(opts?: ShowOptions): ShowResult {
  const config = resolveConfig(opts);
  const store = openStore(config, { readonly: true, now: opts?.now });
  if (!store) {
    return { found: false, nodes: [], report: missingStoreReport(config) };
  }

  let nodes: MemoryNode[];
  try {
    nodes = store.findLast(opts?.limit ?? DEFAULT_SHOW_LIMIT, opts?.circleId);
  } finally {
    store.close();
  }

  const scope = opts?.circleId ? `circle '${opts.circleId}'` : 'all circles';
  if (nodes.length === 0) {
    return { found: true, nodes, report: `No memories in ${scope}.` };
  }

  const lines = [`=== Mnemo Memory: ${plural(nodes.length, 'node')} in ${scope} ===`, ''];
  nodes.forEach((node, i) => {
    lines.push(`[${i + 1}] ${node.createdAt}  circle=${node.circleId}  model=${node.vectorModelId}`);
    if (opts?.full) {
      lines.push(`    id:       ${node.nodeId}`);
      lines.push(`    expires:  ${node.expiresAt ?? '-'}`);
      lines.push(`    vector:   ${node.vector.length} dims`);
      lines.push(`    metadata: ${JSON.stringify(node.metadata)}`);
      lines.push(...node.content.split('\n').map(l => `    | ${l}`));
    } else {
      lines.push(`    ${preview(node.content, PREVIEW_CHARS)}`);
    }
  });

  return { found: true, nodes, report: lines.join('\n') };
}
