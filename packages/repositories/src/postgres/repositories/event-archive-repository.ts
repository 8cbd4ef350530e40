import { randomUUID } from 'node:crypto';
import { and, asc, eq, gte, sql } from 'drizzle-orm';
import type { FeedId, WireEvent } from '@logitrace/protocol';
import type { Database } from '../db.js';
import { logisticsEvents } from '../schema/index.js';
import type {
  ArchivedEvent,
  ArchivedEventFilter,
  EventArchiveRepository,
} from '../../interfaces/index.js';
import { MAX_ARCHIVE_PAGE } from '../../interfaces/index.js';

type LogisticsEventRow = typeof logisticsEvents.$inferSelect;

export function rowToArchivedEvent(row: LogisticsEventRow): ArchivedEvent {
  return {
    id: row.id,
    sessionId: row.sessionId,
    sequence: row.sequence,
    event: row.event,
    archivedAt: row.archivedAt.toISOString(),
  };
}

export class PgEventArchiveRepository implements EventArchiveRepository {
  constructor(private db: Database) {}

  async append(sessionId: FeedId, events: readonly WireEvent[]): Promise<ArchivedEvent[]> {
    if (events.length === 0) return [];

    return this.db.transaction(async (tx) => {
      const [current] = await tx
        .select({ max: sql<number | null>`max(${logisticsEvents.sequence})` })
        .from(logisticsEvents)
        .where(eq(logisticsEvents.sessionId, sessionId));

      const base = Number(current?.max ?? 0);

      const rows = await tx
        .insert(logisticsEvents)
        .values(
          events.map((event, i) => ({
            id: randomUUID(),
            sessionId,
            sequence: base + i + 1,
            tick: event.tick,
            action: event.action,
            event,
          }))
        )
        .returning();

      return rows
        .map((row) => rowToArchivedEvent(row))
        .sort((a, b) => a.sequence - b.sequence);
    });
  }

  async list(filter: ArchivedEventFilter): Promise<ArchivedEvent[]> {
    const conditions = [];

    if (filter.sessionId !== undefined) {
      conditions.push(eq(logisticsEvents.sessionId, filter.sessionId));
    }

    if (filter.fromTick !== undefined) {
      conditions.push(gte(logisticsEvents.tick, filter.fromTick));
    }

    const rows = await this.db
      .select()
      .from(logisticsEvents)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(logisticsEvents.sessionId), asc(logisticsEvents.sequence))
      .limit(Math.min(filter.limit, MAX_ARCHIVE_PAGE))
      .offset(filter.offset ?? 0);

    return rows.map((row) => rowToArchivedEvent(row));
  }

  async count(sessionId?: FeedId): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(logisticsEvents)
      .where(sessionId !== undefined ? eq(logisticsEvents.sessionId, sessionId) : undefined);

    return Number(result?.count ?? 0);
  }
}
