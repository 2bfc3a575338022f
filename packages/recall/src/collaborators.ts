/**
 * Capability contracts for everything outside the core.
 *
 * Concrete implementations (OS clipboard, global hotkeys, tray, picker
 * window, on-device embedding model) are chosen once at startup and handed to
 * MemoryRuntime. The core never inspects which variant it got.
 */

import type { MemoryNode, RecallMode, PurgeScope } from '@mnemo/shared';

// ─── Embedding ───────────────────────────────────────────────────

export interface EmbeddingProvider {
  /** Stable id of the model; stored next to every vector it produces. */
  readonly modelId: string;
  /** Fixed-length embedding of text. Should stop work when signal aborts. */
  encode(text: string, signal?: AbortSignal): Promise<number[]>;
}

// ─── Clipboard & Keyboard ────────────────────────────────────────

/** Outcome of a best-effort text read; a miss carries its reason. */
export type TextRead =
  | { ok: true; text: string }
  | { ok: false; reason: string };

export interface ClipboardProvider {
  getText(): Promise<TextRead>;
  setText(text: string): Promise<void>;
  /** Copy the active selection into the clipboard and return it. */
  captureFromSelection(): Promise<TextRead>;
}

export interface KeystrokeProvider {
  /** Synthesize the platform paste shortcut into the focused window. */
  sendPaste(): Promise<void>;
}

// ─── Picker ──────────────────────────────────────────────────────

export interface PickerRequest {
  mode: RecallMode;
  circleId: string;
  /** Candidates already ranked against the reference text. */
  candidates: MemoryNode[];
  vectorModelId: string;
  /** Embed a live query; null when embedding failed or timed out. */
  vectorize(query: string): Promise<number[] | null>;
  /** Re-rank the candidate window against a live query. */
  rerank(query: string): Promise<MemoryNode[]>;
}

export interface Picker {
  /** The chosen display string, or null when the user cancelled. */
  select(request: PickerRequest): Promise<string | null>;
}

// ─── Tray / Notifications ────────────────────────────────────────

export interface PurgeNotice {
  scope: PurgeScope;
  circleId: string | null;
  deleted: number;
}

export interface TraySurface {
  circleSwitched(circleId: string, previousCircleId: string): void;
  memoryPurged(notice: PurgeNotice): void;
}
