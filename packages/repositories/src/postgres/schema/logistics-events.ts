import { pgTable, text, integer, timestamp, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import type { WireEvent } from '@logitrace/protocol';

/**
 * Archived logistics events - append-only.
 *
 * Design notes:
 * - One row per event, in wire format (feed version 1)
 * - (session_id, sequence) orders a session's events
 * - tick and action are duplicated out of the record for filtering
 */
export const logisticsEvents = pgTable(
  'logistics_events',
  {
    id: text('id').primaryKey(),
    sessionId: text('session_id').notNull(),
    sequence: integer('sequence').notNull(),
    tick: integer('tick').notNull(),
    action: text('action').notNull(), // TAKE | GIVE | MAKE
    event: jsonb('event').$type<WireEvent>().notNull(),
    archivedAt: timestamp('archived_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('logistics_events_session_seq_idx').on(table.sessionId, table.sequence),
    index('logistics_events_tick_idx').on(table.tick),
  ]
);
