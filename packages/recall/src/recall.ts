/**
 * Recall / View — Bring a Memory Back
 *
 * idle → candidates-fetched → reference-embedded → ranked → presented
 *      → (paste | copy | cancelled)
 *
 * Candidates are the newest window of the requested circle. They are ranked
 * against whatever the user has selected (or on the clipboard) and handed to
 * the picker, which keeps re-ranking them as the user types.
 *
 * 'recall' writes the choice to the clipboard and synthesizes a paste.
 * 'view' only writes it to the clipboard.
 */

import {
  NodeStore,
  EventBus,
  createEvent,
  createLogger,
  errorCode,
  errorMessage,
  preview,
} from '@mnemo/shared';
import type { RecallMode } from '@mnemo/shared';
import { rank } from '@mnemo/ranking';
import type {
  ClipboardProvider,
  EmbeddingProvider,
  KeystrokeProvider,
  Picker,
  PickerRequest,
  TextRead,
} from './collaborators.js';
import type { CircleContext } from './circle-context.js';
import type { RecallOutcome, ReferenceText } from './types.js';
import { embedText } from './embedding.js';

const log = createLogger('Recall');

export interface RecallSettings {
  recallWindow: number;
  embeddingTimeoutMs: number;
}

export interface RecallDeps {
  store: NodeStore;
  bus: EventBus;
  embedder: EmbeddingProvider;
  clipboard: ClipboardProvider;
  keystroke: KeystrokeProvider;
  picker: Picker;
  circles: CircleContext;
}

export interface RecallRequest {
  mode: RecallMode;
  /** Defaults to the active circle. */
  circleId?: string;
}

export class RecallMemory {
  private deps: RecallDeps;
  private settings: RecallSettings;

  constructor(deps: RecallDeps, settings: RecallSettings) {
    this.deps = deps;
    this.settings = settings;
  }

  /**
   * Run one recall interaction. Never throws.
   * An aborted signal at any step ends in 'cancelled' with no clipboard write.
   */
  async execute(request: RecallRequest, signal?: AbortSignal): Promise<RecallOutcome> {
    const circleId = request.circleId ?? this.deps.circles.get();
    try {
      return await this.run(request.mode, circleId, signal);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(`Recall (${request.mode}) failed in '${circleId}': ${error.message}`);
      await this.deps.bus.emit(createEvent(
        'memory.recall_failed',
        'recall',
        { reason: error.message, errorCode: errorCode(err) },
        { circleId }
      ));
      return { status: 'failed', error };
    }
  }

  /**
   * Selection first, then the clipboard, then the empty string.
   * Collaborator errors count as misses.
   */
  async resolveReferenceText(): Promise<ReferenceText> {
    const misses: ReferenceText['misses'] = [];

    const selection = await readSafely(() => this.deps.clipboard.captureFromSelection());
    if (selection.ok && selection.text.trim()) {
      return { text: selection.text, source: 'selection', misses };
    }
    misses.push({ source: 'selection', reason: selection.ok ? 'empty text' : selection.reason });

    const clipboard = await readSafely(() => this.deps.clipboard.getText());
    if (clipboard.ok && clipboard.text.trim()) {
      return { text: clipboard.text, source: 'clipboard', misses };
    }
    misses.push({ source: 'clipboard', reason: clipboard.ok ? 'empty text' : clipboard.reason });

    return { text: '', source: 'none', misses };
  }

  /**
   * Embed a query for ranking. Returns null instead of failing so the picker
   * keeps working on the fuzzy and keyword terms alone.
   */
  async vectorize(text: string): Promise<number[] | null> {
    if (!text.trim()) return null;
    try {
      return await embedText(this.deps.embedder, text, this.settings.embeddingTimeoutMs);
    } catch (err) {
      log.warn(`Reference embedding unavailable, ranking without vectors: ${errorMessage(err)}`);
      return null;
    }
  }

  private async run(mode: RecallMode, circleId: string, signal?: AbortSignal): Promise<RecallOutcome> {
    const { store, bus, embedder, clipboard, keystroke, picker } = this.deps;

    const candidates = store.findLast(this.settings.recallWindow, circleId);
    if (candidates.length === 0) {
      log.info(`No memories in circle '${circleId}'`);
      return { status: 'empty', circleId };
    }
    if (signal?.aborted) return cancelled();

    const reference = await this.resolveReferenceText();
    for (const miss of reference.misses) {
      log.debug(`Reference ${miss.source} skipped: ${miss.reason}`);
    }

    const referenceVector = await this.vectorize(reference.text);
    if (signal?.aborted) return cancelled();

    const modelId = embedder.modelId;
    const ranked = rank(reference.text, candidates, referenceVector, modelId);

    const pickerRequest: PickerRequest = {
      mode,
      circleId,
      candidates: ranked,
      vectorModelId: modelId,
      vectorize: query => this.vectorize(query),
      rerank: async query => rank(query, candidates, await this.vectorize(query), modelId),
    };

    let choice: string | null;
    try {
      choice = await picker.select(pickerRequest);
    } catch (err) {
      if (signal?.aborted) return cancelled();
      throw err;
    }

    if (choice === null || signal?.aborted) return cancelled();

    const node = candidates.find(c => c.content === choice) ?? null;
    const content = node ? node.content : choice;

    await clipboard.setText(content);
    if (mode === 'recall') {
      await keystroke.sendPaste();
    }

    const action = mode === 'recall' ? 'paste' : 'copy';
    log.info(`Recalled (${action}) from '${circleId}': '${preview(content)}'`);
    await bus.emit(createEvent(
      'memory.node_recalled',
      'recall',
      { nodeId: node?.nodeId ?? null, circleId, mode, action },
      { circleId }
    ));

    return mode === 'recall'
      ? { status: 'pasted', content, node }
      : { status: 'copied', content, node };
  }
}

function cancelled(): RecallOutcome {
  log.debug('Recall cancelled');
  return { status: 'cancelled' };
}

async function readSafely(read: () => Promise<TextRead>): Promise<TextRead> {
  try {
    return await read();
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
}
