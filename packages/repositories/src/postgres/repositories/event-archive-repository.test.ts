// Tests for the Postgres archive row mapping.
// Query behaviour is covered through the in-memory archive, which fulfils
// the same EventArchiveRepository contract.

import { describe, it, expect } from 'vitest';
import type { WireEvent } from '@logitrace/protocol';
import { rowToArchivedEvent } from './event-archive-repository.js';

const event: WireEvent = {
  tick: 600,
  actor: { type: 'logistic-robot', id: 12, name: 'construction-robot' },
  action: 'TAKE',
  source_or_target: { type: 'logistic-network', id: 0, slot_name: 'storage' },
  item: { name: 'assembling-machine-2', quantity: 1, quality: 'normal' },
};

describe('rowToArchivedEvent', () => {
  it('maps columns to an archived event', () => {
    const archived = rowToArchivedEvent({
      id: 'row-1',
      sessionId: 'feed-1',
      sequence: 7,
      tick: 600,
      action: 'TAKE',
      event,
      archivedAt: new Date('2024-01-15T08:00:00.000Z'),
    });

    expect(archived).toEqual({
      id: 'row-1',
      sessionId: 'feed-1',
      sequence: 7,
      event,
      archivedAt: '2024-01-15T08:00:00.000Z',
    });
  });
});
