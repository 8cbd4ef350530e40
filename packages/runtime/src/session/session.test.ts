import { describe, it, expect, vi } from 'vitest';
import type { LogisticsEvent } from '@logitrace/protocol';
import type { TrackerConfigInput } from '../config.js';
import { ConfigurationError, FeedIdentifierError } from '../errors.js';
import { createCapturingLogger } from '../logging.js';
import { FakePlayer, fakeAssembler, fakeRobot, fakeStack } from '../test-support/fake-world.js';
import { LogisticsSession } from './session.js';

// --- Test Fixtures ---

function createSession(config: TrackerConfigInput = {}) {
  const logger = createCapturingLogger();
  let issued = 0;
  const session = new LogisticsSession({
    config,
    logger,
    createFeedId: () => `feed-${++issued}`,
  });
  return { session, logger };
}

function emitThree(session: LogisticsSession, tick = 10) {
  const player = new FakePlayer(1, 'alice');
  player.hold('wood', 20);
  session.handle({ type: 'cursor-stack-changed', tick, player });
  session.handle({ type: 'player-picked-up-item', tick, player, itemStack: fakeStack('stone', 2) });
}

describe('LogisticsSession', () => {
  it('logs its feed identifier on start', () => {
    const { session, logger } = createSession();

    expect(session.getEventId()).toBe('feed-1');
    expect(logger.entries[0]).toMatchObject({
      level: 'info',
      message: 'Logistics session initialized',
      data: { feedId: 'feed-1' },
    });
  });

  it('rejects invalid configuration', () => {
    expect(() => createSession({ scanIntervalTicks: 0 })).toThrow(ConfigurationError);
  });

  describe('pull interface', () => {
    it('returns events in emission order and clears them', () => {
      const { session } = createSession();
      emitThree(session);

      expect(session.getEvents(1).map((e) => [e.action, e.location.kind])).toEqual([
        ['TAKE', 'world'],
        ['TAKE', 'ground'],
        ['GIVE', 'player-inventory'],
      ]);

      session.clearEvents();
      expect(session.getEvents(1)).toEqual([]);
    });

    it('reads from an index', () => {
      const { session } = createSession();
      emitThree(session);

      expect(session.getEvents(3).map((e) => e.action)).toEqual(['GIVE']);
      expect(session.getEvents(4)).toEqual([]);
    });

    it('reads from the start for a missing or unusable index', () => {
      const { session } = createSession();
      emitThree(session);

      expect(session.getEvents()).toHaveLength(3);
      expect(session.getEvents(0)).toHaveLength(3);
      expect(session.getEvents(-2)).toHaveLength(3);
      expect(session.getEvents(2.5)).toHaveLength(3);
    });

    it('restarts indexes after a clear', () => {
      const { session, logger } = createSession();
      emitThree(session);

      session.clearEvents();
      emitThree(session);

      expect(session.getEvents(1)[0].action).toBe('TAKE');
      expect(session.eventCount).toBe(2);
      expect(logger.entries.find((e) => e.message === 'Event log cleared')?.data).toEqual({ cleared: 3 });
    });
  });

  describe('notifications', () => {
    it('drops malformed notifications without emitting', () => {
      const { session, logger } = createSession();

      const accepted = session.handle({ type: 'player-picked-up-item', tick: 5, player: new FakePlayer(1, 'alice') });

      expect(accepted).toBe(false);
      expect(session.eventCount).toBe(0);
      expect(logger.entries.at(-1)).toMatchObject({
        level: 'debug',
        message: 'Dropped malformed notification',
        data: { type: 'player-picked-up-item' },
      });
    });

    it('drops stacks that report a non-positive count', () => {
      const { session, logger } = createSession();

      const accepted = session.handle({
        type: 'player-picked-up-item',
        tick: 5,
        player: new FakePlayer(1, 'alice'),
        itemStack: fakeStack('stone', 0),
      });

      expect(accepted).toBe(false);
      expect(session.eventCount).toBe(0);
      expect(logger.entries.at(-1)).toMatchObject({
        message: 'Dropped malformed notification',
        data: { issues: ['item stack count is not a positive integer'] },
      });
    });

    it('drops notifications whose handles are no longer valid', () => {
      const { session } = createSession();
      const assembler = fakeAssembler(9);
      assembler.destroy();

      const accepted = session.handle({
        type: 'robot-built-entity',
        tick: 5,
        robot: fakeRobot(1),
        entity: assembler,
        stack: fakeStack('assembling-machine-2', 1),
      });

      expect(accepted).toBe(false);
      expect(session.watchedEntities).toBe(0);
    });

    it('never moves the clock backwards', () => {
      const { session } = createSession();
      emitThree(session, 200);

      emitThree(session, 150);

      // The hand did not change, so only the pick-up is booked the second time
      expect(session.tick).toBe(200);
      expect(session.getEvents(4).map((e) => e.tick)).toEqual([200, 200]);
    });
  });

  describe('subscriptions', () => {
    it('pushes events to subscribers once per handler', () => {
      const { session } = createSession();
      const received: LogisticsEvent[] = [];
      const handler = (event: LogisticsEvent) => received.push(event);

      session.subscribe('feed-1', handler);
      session.subscribe('feed-1', handler);
      emitThree(session);

      expect(received).toEqual(session.getEvents());
    });

    it('refuses an unknown identifier', () => {
      const { session } = createSession();

      expect(() => session.subscribe('feed-9', vi.fn())).toThrow(FeedIdentifierError);
    });

    it('stops pushing after unsubscribe', () => {
      const { session } = createSession();
      const handler = vi.fn();
      session.subscribe('feed-1', handler);

      expect(session.unsubscribe(handler)).toBe(true);
      emitThree(session);

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('reset', () => {
    it('issues a new identifier and invalidates old subscriptions', () => {
      const { session, logger } = createSession();
      const handler = vi.fn();
      session.subscribe('feed-1', handler);

      expect(session.reset()).toBe('feed-2');
      emitThree(session);

      expect(handler).not.toHaveBeenCalled();
      expect(() => session.subscribe('feed-1', handler)).toThrow(FeedIdentifierError);
      expect(logger.entries.find((e) => e.message === 'Logistics session reset')?.data).toEqual({ feedId: 'feed-2' });
    });

    it('drops all observation state', () => {
      const { session } = createSession();
      emitThree(session, 300);
      session.handle({
        type: 'robot-built-entity',
        tick: 300,
        robot: fakeRobot(1),
        entity: fakeAssembler(9),
        stack: fakeStack('assembling-machine-2', 1),
      });

      session.reset();

      expect(session.eventCount).toBe(0);
      expect(session.watchedEntities).toBe(0);
      expect(session.tick).toBe(0);
    });
  });

  describe('watchlist', () => {
    it('books robot fills on scan ticks only', () => {
      const { session } = createSession();
      const assembler = fakeAssembler(9);
      session.handle({
        type: 'robot-built-entity',
        tick: 100,
        robot: fakeRobot(1),
        entity: assembler,
        stack: fakeStack('assembling-machine-2', 1),
      });
      assembler.inventories.assembling_machine_modules?.set('speed-module', 2, 'epic');

      expect(session.onTick(119)).toBeUndefined();
      expect(session.onTick(120)?.fills).toBe(1);
      expect(session.getEvents(3).map((e) => [e.tick, e.action, e.item.quality])).toEqual([
        [120, 'TAKE', 'epic'],
        [120, 'GIVE', 'epic'],
      ]);
    });

    it('scans on the session clock when the host reports an older tick', () => {
      const { session } = createSession({ scanIntervalTicks: 10, quiescenceWindowTicks: 50 });
      const assembler = fakeAssembler(9);
      session.handle({
        type: 'robot-built-entity',
        tick: 100,
        robot: fakeRobot(1),
        entity: assembler,
        stack: fakeStack('assembling-machine-2', 1),
      });
      assembler.inventories.assembling_machine_modules?.set('speed-module', 2, 'epic');

      expect(session.onTick(90)?.fills).toBe(1);
      expect(session.getEvents(3).map((e) => e.tick)).toEqual([100, 100]);

      // Quiet for exactly the window since the fill at 100
      expect(session.onTick(150)?.evicted).toEqual([]);
      expect(session.watchedEntities).toBe(1);
    });

    it('applies a new scan interval on reconfigure', () => {
      const { session } = createSession();
      session.handle({
        type: 'robot-built-entity',
        tick: 1,
        robot: fakeRobot(1),
        entity: fakeAssembler(9),
        stack: fakeStack('assembling-machine-2', 1),
      });

      const config = session.reconfigure({ scanIntervalTicks: 7 });

      expect(config).toEqual({ scanIntervalTicks: 7, quiescenceWindowTicks: 36_000, serviceName: 'logistics_events_api' });
      expect(session.onTick(14)?.scanned).toBe(1);
      expect(session.watchedEntities).toBe(1);
    });

    it('keeps the old configuration when reconfigure fails', () => {
      const { session } = createSession();

      expect(() => session.reconfigure({ quiescenceWindowTicks: -5 })).toThrow(ConfigurationError);
      expect(session.config.quiescenceWindowTicks).toBe(36_000);
    });
  });
});
