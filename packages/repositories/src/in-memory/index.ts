// In-memory repository implementations
//
// The event log implementation is the one sessions use by default. The
// archive implementation is for development and tests; data does not
// survive a restart.

import type { FeedId, LogisticsEvent, WireEvent } from '@logitrace/protocol';
import type {
  ArchivedEvent,
  ArchivedEventFilter,
  EventArchiveRepository,
  EventLogRepository,
} from '../interfaces/index.js';
import { MAX_ARCHIVE_PAGE } from '../interfaces/index.js';

/**
 * Event log backed by an array.
 *
 * @example
 * ```typescript
 * const log = createInMemoryEventLog();
 * log.append(event); // 1
 * log.readFrom(1);   // [event]
 * ```
 */
export function createInMemoryEventLog(): EventLogRepository {
  let events: LogisticsEvent[] = [];

  return {
    append(event) {
      events.push(event);
      return events.length;
    },
    readFrom(fromIndex) {
      const start = Math.max(1, fromIndex);
      return events.slice(start - 1);
    },
    size() {
      return events.length;
    },
    clear() {
      events = [];
    },
  };
}

/**
 * Archive with access to its records for inspection.
 */
export interface InMemoryEventArchive extends EventArchiveRepository {
  /** Direct access to stored records (for debugging/testing) */
  _records: ArchivedEvent[];
  clear(): void;
}

export function createInMemoryEventArchive(): InMemoryEventArchive {
  const records: ArchivedEvent[] = [];
  const sequences = new Map<FeedId, number>();

  return {
    _records: records,

    async append(sessionId: FeedId, events: readonly WireEvent[]) {
      const archivedAt = new Date().toISOString();
      let sequence = sequences.get(sessionId) ?? 0;
      const stored: ArchivedEvent[] = [];

      for (const event of events) {
        sequence += 1;
        const record: ArchivedEvent = {
          id: `archived-${records.length + 1}`,
          sessionId,
          sequence,
          event,
          archivedAt,
        };
        records.push(record);
        stored.push(record);
      }

      sequences.set(sessionId, sequence);
      return stored;
    },

    async list(filter: ArchivedEventFilter) {
      let result = records.slice();

      if (filter.sessionId !== undefined) {
        result = result.filter((r) => r.sessionId === filter.sessionId);
      }
      if (filter.fromTick !== undefined) {
        const fromTick = filter.fromTick;
        result = result.filter((r) => r.event.tick >= fromTick);
      }

      result.sort((a, b) =>
        a.sessionId === b.sessionId ? a.sequence - b.sequence : a.sessionId < b.sessionId ? -1 : 1
      );

      const offset = filter.offset ?? 0;
      const limit = Math.min(filter.limit, MAX_ARCHIVE_PAGE);
      return result.slice(offset, offset + limit);
    },

    async count(sessionId?: FeedId) {
      if (sessionId === undefined) return records.length;
      return records.filter((r) => r.sessionId === sessionId).length;
    },

    clear() {
      records.length = 0;
      sequences.clear();
    },
  };
}
