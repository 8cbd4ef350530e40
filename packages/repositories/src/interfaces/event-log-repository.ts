import type { LogisticsEvent } from '@logitrace/protocol';

/**
 * Repository interface for the session event log.
 *
 * The log is append-only and ordered; events are addressed by their 1-based
 * position. It is read and written from inside simulation steps, so every
 * operation is synchronous.
 */
export interface EventLogRepository {
  /**
   * Append an event.
   * @returns the 1-based index of the appended event
   */
  append(event: LogisticsEvent): number;

  /**
   * All events at or after a 1-based index, in insertion order.
   * An index past the end yields an empty list.
   */
  readFrom(fromIndex: number): LogisticsEvent[];

  /** Number of events in the log */
  size(): number;

  /**
   * Remove every event. The next append gets index 1 again.
   * This is the only way events leave the log.
   */
  clear(): void;
}
