/**
 * Background eviction of expired nodes.
 * The interval timer is unref'd so it never keeps the process alive alone.
 */

import { MAX_SWEEP_INTERVAL_SECONDS, ValidationError, createLogger } from '@mnemo/shared';
import type { PurgeMemory } from './purge.js';
import type { PurgeOutcome } from './types.js';

const log = createLogger('TtlSweeper');

export interface TtlSweeperOptions {
  intervalSeconds: number;
  ttlSeconds: number;
}

export class TtlSweeper {
  private purge: PurgeMemory;
  private opts: TtlSweeperOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private sweeping = false;

  constructor(purge: PurgeMemory, opts: TtlSweeperOptions) {
    if (!(opts.intervalSeconds > 0) || opts.intervalSeconds > MAX_SWEEP_INTERVAL_SECONDS) {
      throw new ValidationError(
        'intervalSeconds',
        `must be > 0 and <= ${MAX_SWEEP_INTERVAL_SECONDS}, got ${opts.intervalSeconds}`
      );
    }
    this.purge = purge;
    this.opts = opts;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweepOnce().catch(err => log.error('Sweep failed:', err));
    }, this.opts.intervalSeconds * 1000);
    this.timer.unref();
    log.info(`Started: every ${this.opts.intervalSeconds}s, TTL ${this.opts.ttlSeconds}s`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    log.info('Stopped');
  }

  /**
   * Run one sweep now. Returns null when a sweep is already in progress.
   */
  async sweepOnce(): Promise<PurgeOutcome | null> {
    if (this.sweeping) {
      log.debug('Previous sweep still running, skipping');
      return null;
    }
    this.sweeping = true;
    try {
      return await this.purge.expired(this.opts.ttlSeconds);
    } finally {
      this.sweeping = false;
    }
  }
}
