/**
 * MemoryRuntime — Composition Root
 *
 * Builds the store, bus, circle context, use cases and sweeper from a config
 * and the platform collaborators chosen at startup. A daemon (hotkeys, tray,
 * picker window) owns one runtime for its lifetime.
 */

import {
  NodeStore,
  EventBus,
  LOCAL_CIRCLE_ID,
  createEvent,
  createLogger,
} from '@mnemo/shared';
import type { CircleSummary, MnemoConfig } from '@mnemo/shared';
import type {
  ClipboardProvider,
  EmbeddingProvider,
  KeystrokeProvider,
  Picker,
  TraySurface,
} from './collaborators.js';
import { CircleContext } from './circle-context.js';
import { CaptureMemory } from './capture.js';
import { RecallMemory } from './recall.js';
import { PurgeMemory } from './purge.js';
import { TtlSweeper } from './ttl-sweeper.js';
import { attachTraySurface } from './tray.js';
import { HashingEmbeddingProvider } from './hashing-embedder.js';

const log = createLogger('Runtime');

export interface RuntimeCollaborators {
  clipboard: ClipboardProvider;
  keystroke: KeystrokeProvider;
  picker: Picker;
  /** Defaults to the bundled HashingEmbeddingProvider. */
  embedder?: EmbeddingProvider;
  tray?: TraySurface;
}

export interface RuntimeOptions {
  store?: NodeStore;
  bus?: EventBus;
  now?: () => Date;
}

export class MemoryRuntime {
  readonly config: MnemoConfig;
  readonly store: NodeStore;
  readonly bus: EventBus;
  readonly circles: CircleContext;
  readonly embedder: EmbeddingProvider;
  readonly capture: CaptureMemory;
  readonly recall: RecallMemory;
  readonly purge: PurgeMemory;
  readonly sweeper: TtlSweeper;

  private detachTray: (() => void) | null = null;
  private started = false;

  constructor(config: MnemoConfig, collaborators: RuntimeCollaborators, opts?: RuntimeOptions) {
    this.config = config;
    this.store = opts?.store ?? new NodeStore(config.dbPath, {
      busyTimeoutMs: config.busyTimeoutMs,
      now: opts?.now,
    });
    this.bus = opts?.bus ?? new EventBus();
    this.circles = new CircleContext(config.defaultCircle);
    this.embedder = collaborators.embedder ?? new HashingEmbeddingProvider();

    this.capture = new CaptureMemory(
      {
        store: this.store,
        bus: this.bus,
        embedder: this.embedder,
        clipboard: collaborators.clipboard,
        circles: this.circles,
      },
      { ttlSeconds: config.ttlSeconds, embeddingTimeoutMs: config.embeddingTimeoutMs, now: opts?.now }
    );

    this.recall = new RecallMemory(
      {
        store: this.store,
        bus: this.bus,
        embedder: this.embedder,
        clipboard: collaborators.clipboard,
        keystroke: collaborators.keystroke,
        picker: collaborators.picker,
        circles: this.circles,
      },
      { recallWindow: config.recallWindow, embeddingTimeoutMs: config.embeddingTimeoutMs }
    );

    this.purge = new PurgeMemory(this.store, this.bus, { ttlSeconds: config.ttlSeconds });
    this.sweeper = new TtlSweeper(this.purge, {
      intervalSeconds: config.sweepIntervalSeconds,
      ttlSeconds: config.ttlSeconds,
    });

    if (collaborators.tray) {
      this.detachTray = attachTraySurface(this.bus, collaborators.tray);
    }
  }

  /**
   * Register the configured circles, run one sweep and start the timer.
   * A failed start leaves the runtime unstarted, so it can be retried.
   */
  async start(): Promise<void> {
    if (this.started) return;

    this.store.registerCircle({ circleId: LOCAL_CIRCLE_ID, name: LOCAL_CIRCLE_ID, localOnly: true, metadata: {} });
    for (const circle of this.config.circles) {
      this.store.registerCircle({ circleId: circle.id, name: circle.name, localOnly: circle.localOnly, metadata: {} });
      await this.bus.emit(createEvent('circle.registered', 'circle', { circleId: circle.id, name: circle.name }, {
        circleId: circle.id,
      }));
    }

    await this.sweeper.sweepOnce();
    this.sweeper.start();
    this.started = true;
    log.info(`Started in circle '${this.circles.get()}' (${this.store.dbPath})`);
  }

  /**
   * Make circleId the active circle, registering it if the store has not
   * seen it. Returns whether the active circle changed.
   */
  async switchCircle(circleId: string): Promise<boolean> {
    const previousCircleId = this.circles.get();
    const changed = this.circles.set(circleId);
    if (!changed) return false;

    const current = this.circles.get();
    if (!this.store.getCircle(current)) {
      this.store.registerCircle({ circleId: current, name: current, localOnly: true, metadata: {} });
      await this.bus.emit(createEvent('circle.registered', 'circle', { circleId: current, name: current }, {
        circleId: current,
      }));
    }

    await this.bus.emit(createEvent('circle.switched', 'circle', { circleId: current, previousCircleId }, {
      circleId: current,
    }));
    return true;
  }

  listCircles(): CircleSummary[] {
    return this.store.listCircles();
  }

  close(): void {
    this.sweeper.stop();
    if (this.detachTray) {
      this.detachTray();
      this.detachTray = null;
    }
    this.store.close();
    log.info('Closed');
  }
}
