import { describe, it, expect } from 'vitest';
import { parseEventLog } from '@logitrace/protocol';
import { silentLogger } from '../logging.js';
import { LogisticsSession } from '../session/session.js';
import { FakePlayer, fakeStack } from '../test-support/fake-world.js';
import { createFeedApi } from './api.js';

function createSession() {
  let issued = 0;
  return new LogisticsSession({ logger: silentLogger, createFeedId: () => `feed-${++issued}` });
}

describe('createFeedApi', () => {
  it('returns events in order and clears them', () => {
    const session = createSession();
    const api = createFeedApi(session);
    const player = new FakePlayer(1, 'alice');
    player.hold('wood', 20);
    session.handle({ type: 'cursor-stack-changed', tick: 10, player });
    session.handle({ type: 'player-picked-up-item', tick: 11, player, itemStack: fakeStack('stone', 2) });

    expect(api.getEvents(1).map((e) => [e.tick, e.action])).toEqual([
      [10, 'TAKE'],
      [11, 'TAKE'],
      [11, 'GIVE'],
    ]);

    api.clearEvents();
    expect(api.getEvents(1)).toEqual([]);
  });

  it('reports the feed version', () => {
    expect(createFeedApi(createSession()).getFeedVersion()).toBe(1);
  });

  it('follows the session identifier across resets', () => {
    const session = createSession();
    const api = createFeedApi(session);

    expect(api.getEventId()).toBe('feed-1');
    session.reset();
    expect(api.getEventId()).toBe('feed-2');
  });

  it('exports events as NDJSON wire records', () => {
    const session = createSession();
    const player = new FakePlayer(1, 'alice');
    player.hold('wood', 20);
    session.handle({ type: 'cursor-stack-changed', tick: 10, player });

    const exported = createFeedApi(session).exportEvents();

    expect(exported).toBe(
      '{"tick":10,"actor":{"type":"player-hand","id":1,"name":"alice"},"action":"TAKE",' +
        '"source_or_target":{"type":"world","id":0,"slot_name":"none"},' +
        '"item":{"name":"wood","quantity":20,"quality":"normal"}}\n'
    );
    expect(parseEventLog(exported)).toHaveLength(1);
  });

  it('exports nothing for an empty log', () => {
    expect(createFeedApi(createSession()).exportEvents()).toBe('');
  });
});
