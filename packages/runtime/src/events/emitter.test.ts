import { describe, it, expect, vi } from 'vitest';
import type { Actor, Item, LogisticsEvent } from '@logitrace/protocol';
import { createInMemoryEventLog } from '@logitrace/repositories';
import { createCapturingLogger } from '../logging.js';
import { LogisticsEventEmitter } from './emitter.js';
import { WORLD_LOCATION, playerInventoryLocation } from '../composer/locations.js';

const actor: Actor = { kind: 'player-hand', id: 1, name: 'alice' };
const item: Item = { name: 'iron-plate', quantity: 5, quality: 'normal' };

function createEmitter(tick = 100) {
  const log = createInMemoryEventLog();
  const logger = createCapturingLogger();
  let now = tick;
  const emitter = new LogisticsEventEmitter({ log, clock: () => now, logger });
  return {
    emitter,
    log,
    logger,
    setTick(t: number) {
      now = t;
    },
  };
}

describe('LogisticsEventEmitter', () => {
  it('stamps the current tick and appends to the log', () => {
    const { emitter, log, setTick } = createEmitter(100);

    const first = emitter.emit(actor, 'TAKE', WORLD_LOCATION, item);
    setTick(160);
    const second = emitter.emit(actor, 'GIVE', playerInventoryLocation(1), item);

    expect(first.tick).toBe(100);
    expect(second.tick).toBe(160);
    expect(log.readFrom(1)).toEqual([first, second]);
  });

  it('allows several events on the same tick', () => {
    const { emitter, log } = createEmitter();

    emitter.emit(actor, 'TAKE', WORLD_LOCATION, item);
    emitter.emit(actor, 'GIVE', WORLD_LOCATION, item);

    expect(log.readFrom(1).map((e) => e.tick)).toEqual([100, 100]);
  });

  it('freezes emitted events', () => {
    const { emitter } = createEmitter();

    const event = emitter.emit(actor, 'MAKE', WORLD_LOCATION, item);

    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.item)).toBe(true);
    expect(Object.isFrozen(event.location)).toBe(true);
  });

  it('pushes to subscribers before returning', () => {
    const { emitter } = createEmitter();
    const received: LogisticsEvent[] = [];
    emitter.subscribe((e) => received.push(e));

    const event = emitter.emit(actor, 'TAKE', WORLD_LOCATION, item);

    expect(received).toEqual([event]);
  });

  it('does not deliver twice to a handler subscribed twice', () => {
    const { emitter } = createEmitter();
    const handler = vi.fn();

    expect(emitter.subscribe(handler)).toBe(true);
    expect(emitter.subscribe(handler)).toBe(false);
    emitter.emit(actor, 'TAKE', WORLD_LOCATION, item);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(emitter.subscriberCount).toBe(1);
  });

  it('keeps delivering when a subscriber throws', () => {
    const { emitter, log, logger } = createEmitter();
    const after = vi.fn();
    emitter.subscribe(() => {
      throw new Error('consumer down');
    });
    emitter.subscribe(after);

    emitter.emit(actor, 'GIVE', WORLD_LOCATION, item);

    expect(after).toHaveBeenCalledTimes(1);
    expect(log.size()).toBe(1);
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({
      level: 'error',
      message: 'Feed subscriber failed',
      data: { error: 'consumer down', action: 'GIVE', tick: 100 },
    });
  });

  it('emits transfers as TAKE then GIVE', () => {
    const { emitter } = createEmitter();

    const [take, give] = emitter.emitTransfer(actor, WORLD_LOCATION, playerInventoryLocation(1), item);

    expect(take.action).toBe('TAKE');
    expect(take.location).toEqual(WORLD_LOCATION);
    expect(give.action).toBe('GIVE');
    expect(give.location).toEqual({ kind: 'player-inventory', id: 1, slotName: 'main' });
  });

  it('stops delivering after unsubscribe', () => {
    const { emitter } = createEmitter();
    const handler = vi.fn();
    emitter.subscribe(handler);

    expect(emitter.unsubscribe(handler)).toBe(true);
    emitter.emit(actor, 'TAKE', WORLD_LOCATION, item);

    expect(handler).not.toHaveBeenCalled();
  });
});
