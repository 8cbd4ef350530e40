// Composer wired to an in-memory log, for handler tests.

import type { LogisticsEvent, WorldNotification } from '@logitrace/protocol';
import { createInMemoryEventLog } from '@logitrace/repositories';
import { composeNotification, type ComposerContext } from '../composer/index.js';
import { LogisticsEventEmitter } from '../events/emitter.js';
import { DEFAULT_SLOT_SPEC } from '../inventory/slots.js';
import { createCapturingLogger } from '../logging.js';
import { Watchlist } from '../monitoring/watchlist.js';
import { ActorStateStore, EntitySnapshotStore } from '../session/state.js';

export function createComposerHarness(startTick = 100) {
  const log = createInMemoryEventLog();
  const logger = createCapturingLogger();
  let tick = startTick;
  const clock = () => tick;
  const emitter = new LogisticsEventEmitter({ log, clock, logger });
  const entities = new EntitySnapshotStore();
  const ctx: ComposerContext = {
    emitter,
    actors: new ActorStateStore(),
    entities,
    watchlist: new Watchlist({
      emitter,
      entities,
      slotSpec: DEFAULT_SLOT_SPEC,
      logger,
      scanIntervalTicks: 60,
      quiescenceWindowTicks: 36_000,
    }),
    slotSpec: DEFAULT_SLOT_SPEC,
    logger,
    clock,
  };

  return {
    ctx,
    log,
    logger,
    setTick(next: number) {
      tick = next;
    },
    dispatch(notification: WorldNotification) {
      composeNotification(ctx, notification);
    },
    /** Events as compact tuples: [action, location kind, slot, item name, quantity, quality] */
    summary(events: readonly LogisticsEvent[] = log.readFrom(1)) {
      return events.map((e) => [
        e.action,
        e.location.kind,
        e.location.slotName,
        e.item.name,
        e.item.quantity,
        e.item.quality,
      ]);
    },
  };
}
