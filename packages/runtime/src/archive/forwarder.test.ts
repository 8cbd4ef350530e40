import { describe, it, expect } from 'vitest';
import type { EventArchiveRepository } from '@logitrace/repositories';
import { createInMemoryEventArchive } from '@logitrace/repositories';
import { createCapturingLogger, silentLogger } from '../logging.js';
import { LogisticsSession } from '../session/session.js';
import { FakePlayer, fakeStack } from '../test-support/fake-world.js';
import { createArchiveForwarder } from './forwarder.js';

// --- Test Fixtures ---

function createSession() {
  return new LogisticsSession({ logger: silentLogger, createFeedId: () => 'feed-1' });
}

function pickUp(session: LogisticsSession, name: string, tick = 10) {
  session.handle({
    type: 'player-picked-up-item',
    tick,
    player: new FakePlayer(1, 'alice'),
    itemStack: fakeStack(name, 1),
  });
}

describe('createArchiveForwarder', () => {
  it('writes buffered events on flush', async () => {
    const archive = createInMemoryEventArchive();
    const session = createSession();
    const forwarder = createArchiveForwarder(archive, { sessionId: session.getEventId() });
    session.subscribe(session.getEventId(), forwarder.handler);

    pickUp(session, 'stone');
    expect(forwarder.pending).toBe(2);
    expect(archive._records).toHaveLength(0);

    expect(await forwarder.flush()).toBe(2);
    expect(forwarder.pending).toBe(0);

    const stored = await archive.list({ sessionId: 'feed-1', limit: 10 });
    expect(stored.map((r) => [r.sequence, r.event.action, r.event.source_or_target.type])).toEqual([
      [1, 'TAKE', 'ground'],
      [2, 'GIVE', 'player-inventory'],
    ]);
  });

  it('does nothing when nothing is pending', async () => {
    const archive = createInMemoryEventArchive();

    expect(await createArchiveForwarder(archive, { sessionId: 'feed-1' }).flush()).toBe(0);
    expect(await archive.count()).toBe(0);
  });

  it('keeps a failed batch ahead of newer events', async () => {
    const inner = createInMemoryEventArchive();
    let failures = 1;
    const flaky: EventArchiveRepository = {
      async append(sessionId, events) {
        if (failures > 0) {
          failures--;
          throw new Error('connection refused');
        }
        return inner.append(sessionId, events);
      },
      list: (filter) => inner.list(filter),
      count: (sessionId) => inner.count(sessionId),
    };
    const logger = createCapturingLogger();
    const session = createSession();
    const forwarder = createArchiveForwarder(flaky, { sessionId: 'feed-1', logger });
    session.subscribe('feed-1', forwarder.handler);

    pickUp(session, 'stone');
    await expect(forwarder.flush()).rejects.toThrow('connection refused');
    expect(forwarder.pending).toBe(2);
    expect(logger.entries[0]).toMatchObject({
      level: 'error',
      message: 'Archive flush failed',
      data: { sessionId: 'feed-1', pending: 2, error: 'connection refused' },
    });

    pickUp(session, 'coal', 20);
    expect(await forwarder.flush()).toBe(4);

    const stored = await inner.list({ limit: 10 });
    expect(stored.map((r) => r.event.item.name)).toEqual(['stone', 'stone', 'coal', 'coal']);
  });
});
