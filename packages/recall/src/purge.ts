/**
 * Purge — Forget on Demand
 *
 * Three scopes, each a single store call:
 *   expired  nodes older than the TTL, any circle
 *   circle   every node of one circle
 *   all      every node
 *
 * Failures are logged and returned in the outcome, never retried.
 */

import { NodeStore, EventBus, createEvent, createLogger } from '@mnemo/shared';
import type { PurgeScope } from '@mnemo/shared';
import type { PurgeOutcome } from './types.js';

const log = createLogger('Purge');

export class PurgeMemory {
  private store: NodeStore;
  private bus: EventBus;
  private ttlSeconds: number;

  constructor(store: NodeStore, bus: EventBus, opts: { ttlSeconds: number }) {
    this.store = store;
    this.bus = bus;
    this.ttlSeconds = opts.ttlSeconds;
  }

  /** Delete nodes whose age exceeds ttlSeconds (default: configured TTL). */
  async expired(ttlSeconds: number = this.ttlSeconds): Promise<PurgeOutcome> {
    const outcome = this.attempt('expired', null, () => this.store.deleteExpired(ttlSeconds));
    if (outcome.ok) {
      if (outcome.deleted > 0) {
        log.info(`Expired ${outcome.deleted} nodes older than ${ttlSeconds}s`);
      }
      await this.bus.emit(createEvent('memory.expired', 'sweeper', { ttlSeconds, deleted: outcome.deleted }));
    }
    return outcome;
  }

  async circle(circleId: string): Promise<PurgeOutcome> {
    const outcome = this.attempt('circle', circleId, () => this.store.purgeCircle(circleId));
    if (outcome.ok) {
      await this.bus.emit(createEvent(
        'memory.purged',
        'purge',
        { scope: 'circle', circleId, deleted: outcome.deleted },
        { circleId }
      ));
    }
    return outcome;
  }

  async all(): Promise<PurgeOutcome> {
    const outcome = this.attempt('all', null, () => this.store.purgeAll());
    if (outcome.ok) {
      await this.bus.emit(createEvent('memory.purged', 'purge', { scope: 'all', circleId: null, deleted: outcome.deleted }));
    }
    return outcome;
  }

  private attempt(scope: PurgeScope, circleId: string | null, run: () => number): PurgeOutcome {
    try {
      return { ok: true, scope, circleId, deleted: run() };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      log.error(`Purge (${scope}${circleId ? ` '${circleId}'` : ''}) failed: ${error.message}`);
      return { ok: false, scope, circleId, error };
    }
  }
}
