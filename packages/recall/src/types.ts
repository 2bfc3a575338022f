/**
 * Outcomes of the use-case entry points.
 *
 * The hotkey-facing entry points never throw: they log and hand back one of
 * these, so a failed capture or recall is a quiet no-op for the user.
 */

import type { MemoryNode, PurgeScope } from '@mnemo/shared';

export type CaptureSource = 'clipboard' | 'selection';

export type CaptureOutcome =
  | { status: 'captured'; node: MemoryNode }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: Error };

export type RecallOutcome =
  | { status: 'pasted'; content: string; node: MemoryNode | null }
  | { status: 'copied'; content: string; node: MemoryNode | null }
  | { status: 'cancelled' }
  | { status: 'empty'; circleId: string }
  | { status: 'failed'; error: Error };

export type PurgeOutcome =
  | { ok: true; scope: PurgeScope; circleId: string | null; deleted: number }
  | { ok: false; scope: PurgeScope; circleId: string | null; error: Error };

export type ReferenceSource = 'selection' | 'clipboard' | 'none';

/** The text recall ranks against, and why earlier sources were passed over. */
export interface ReferenceText {
  text: string;
  source: ReferenceSource;
  misses: Array<{ source: Exclude<ReferenceSource, 'none'>; reason: string }>;
}
