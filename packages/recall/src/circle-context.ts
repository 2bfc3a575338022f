/**
 * The active circle: which namespace capture and recall operate on.
 *
 * One instance per process, created by MemoryRuntime and passed to the use
 * cases. Never persisted; every start begins at the configured default.
 * Concurrent readers are fine and writes are last-write-wins.
 */

import { LOCAL_CIRCLE_ID, ValidationError, createLogger } from '@mnemo/shared';

const log = createLogger('CircleContext');

export class CircleContext {
  private current: string;

  constructor(initialCircle: string = LOCAL_CIRCLE_ID) {
    this.current = requireCircleId(initialCircle);
    log.debug(`Initialized with circle: ${this.current}`);
  }

  get(): string {
    return this.current;
  }

  /**
   * Switch the active circle. Setting the current value again is a no-op.
   * Returns whether the active circle changed.
   */
  set(circleId: string): boolean {
    const next = requireCircleId(circleId);
    if (next === this.current) {
      log.debug(`Circle already set to ${next}`);
      return false;
    }
    log.info(`Circle changed: ${this.current} -> ${next}`);
    this.current = next;
    return true;
  }
}

function requireCircleId(circleId: string): string {
  const trimmed = circleId.trim();
  if (!trimmed) {
    throw new ValidationError('circleId', 'must not be empty');
  }
  return trimmed;
}
