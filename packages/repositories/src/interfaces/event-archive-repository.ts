import type { FeedId, WireEvent } from '@logitrace/protocol';

/**
 * An event as stored in the archive.
 */
export type ArchivedEvent = {
  /** Archive-assigned id, unique across sessions */
  id: string;
  /** Feed identifier of the session that produced the event */
  sessionId: FeedId;
  /** Position within the session's batch stream, starting at 1 */
  sequence: number;
  event: WireEvent;
  archivedAt: string;
};

/**
 * Filter for listing archived events.
 * Results are ordered by session, then sequence.
 */
export type ArchivedEventFilter = {
  sessionId?: FeedId;
  /** Only events at or after this tick */
  fromTick?: number;
  /** Maximum number of results. Max 1000. */
  limit: number;
  offset?: number;
};

/**
 * Repository interface for long-term event storage.
 *
 * The session log lives only as long as the session; the archive keeps
 * events across sessions. Writes happen outside simulation steps, in
 * batches.
 */
export interface EventArchiveRepository {
  /**
   * Append a batch of events for a session, keeping their order.
   * @returns the stored records
   */
  append(sessionId: FeedId, events: readonly WireEvent[]): Promise<ArchivedEvent[]>;

  list(filter: ArchivedEventFilter): Promise<ArchivedEvent[]>;

  count(sessionId?: FeedId): Promise<number>;
}

export const MAX_ARCHIVE_PAGE = 1000;
