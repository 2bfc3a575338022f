import type { EventBus } from '@mnemo/shared';
import type { TraySurface } from './collaborators.js';

/**
 * Forward circle switches and purges to the tray. Returns an unsubscribe
 * function. Expiry sweeps are not forwarded; they run every minute.
 */
export function attachTraySurface(bus: EventBus, tray: TraySurface): () => void {
  const offSwitched = bus.on('circle.switched', event => {
    tray.circleSwitched(event.payload.circleId, event.payload.previousCircleId);
  });
  const offPurged = bus.on('memory.purged', event => {
    tray.memoryPurged({
      scope: event.payload.scope,
      circleId: event.payload.circleId,
      deleted: event.payload.deleted,
    });
  });

  return () => {
    offSwitched();
    offPurged();
  };
}
