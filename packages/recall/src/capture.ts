/**
 * Capture — Remember What Was Copied
 *
 * idle → text-acquired → vectorized → persisted
 *
 * The node is only built once the embedding succeeded and is written in a
 * single insert, so a failure at any step leaves the store untouched.
 * Nodes land in the active circle with expiresAt = createdAt + TTL.
 */

import {
  NodeStore,
  EventBus,
  ValidationError,
  ExternalCollaboratorError,
  createEvent,
  createLogger,
  errorCode,
  errorMessage,
  newNodeId,
  preview,
} from '@mnemo/shared';
import type { MemoryNode } from '@mnemo/shared';
import type { ClipboardProvider, EmbeddingProvider, TextRead } from './collaborators.js';
import type { CircleContext } from './circle-context.js';
import type { CaptureOutcome, CaptureSource } from './types.js';
import { embedText } from './embedding.js';

const log = createLogger('Capture');

export interface CaptureSettings {
  ttlSeconds: number;
  embeddingTimeoutMs: number;
  now?: () => Date;
}

export interface CaptureDeps {
  store: NodeStore;
  bus: EventBus;
  embedder: EmbeddingProvider;
  clipboard: ClipboardProvider;
  circles: CircleContext;
}

export class CaptureMemory {
  private deps: CaptureDeps;
  private settings: CaptureSettings;

  constructor(deps: CaptureDeps, settings: CaptureSettings) {
    this.deps = deps;
    this.settings = settings;
  }

  /**
   * Hotkey entry point: read text from the clipboard (or the live selection)
   * and remember it. Never throws.
   */
  async execute(opts?: { from?: CaptureSource; metadata?: Record<string, unknown> }): Promise<CaptureOutcome> {
    const from = opts?.from ?? 'clipboard';

    let read: TextRead;
    try {
      read = from === 'selection'
        ? await this.deps.clipboard.captureFromSelection()
        : await this.deps.clipboard.getText();
    } catch (err) {
      read = { ok: false, reason: errorMessage(err) };
    }

    if (!read.ok) {
      log.warn(`Nothing captured from ${from}: ${read.reason}`);
      return { status: 'skipped', reason: `${from}: ${read.reason}` };
    }
    if (!read.text.trim()) {
      log.debug(`Ignoring empty ${from} text`);
      return { status: 'skipped', reason: `${from}: empty text` };
    }

    try {
      const node = await this.captureText(read.text, opts?.metadata);
      return { status: 'captured', node };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(`Capture failed: ${error.message}`);
      await this.deps.bus.emit(createEvent(
        'memory.capture_failed',
        'capture',
        { reason: error.message, errorCode: errorCode(err) },
        { circleId: this.deps.circles.get() }
      ));
      return { status: 'failed', error };
    }
  }

  /**
   * Remember a piece of text in the active circle.
   * Throws ValidationError for empty text, ExternalCollaboratorError when the
   * embedding fails, and the store's errors when persisting fails.
   */
  async captureText(text: string, metadata: Record<string, unknown> = {}): Promise<MemoryNode> {
    if (!text.trim()) {
      throw new ValidationError('content', 'capture text must not be empty');
    }

    const { store, bus, embedder, circles } = this.deps;
    const circleId = circles.get();

    if (!embedder.modelId.trim()) {
      throw new ExternalCollaboratorError('embedding', 'provider reported an empty model id');
    }
    const vector = await embedText(embedder, text, this.settings.embeddingTimeoutMs);

    const createdAt = (this.settings.now ?? (() => new Date()))();
    const expiry = new Date(createdAt.getTime() + this.settings.ttlSeconds * 1000);
    // a TTL past the last representable date never expires
    const expiresAt = Number.isNaN(expiry.getTime()) ? null : expiry.toISOString();

    const node = store.save({
      nodeId: newNodeId(),
      content: text,
      vector,
      vectorModelId: embedder.modelId,
      metadata,
      createdAt: createdAt.toISOString(),
      expiresAt,
      circleId,
    });

    log.info(`Node ${node.nodeId} persisted in '${circleId}': '${preview(text)}'`);
    await bus.emit(createEvent(
      'memory.node_captured',
      'capture',
      {
        nodeId: node.nodeId,
        circleId,
        vectorModelId: node.vectorModelId,
        contentLength: text.length,
      },
      { circleId }
    ));

    return node;
  }
}
