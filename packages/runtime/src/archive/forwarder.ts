// Archive forwarder - carries feed events into long-term storage
//
// Simulation steps never wait on storage: the forwarder only buffers while
// subscribed, and the owner decides when to `flush()`.

import { toWireEvent, type FeedHandler, type FeedId, type WireEvent } from '@logitrace/protocol';
import type { EventArchiveRepository } from '@logitrace/repositories';
import { errorMessage, silentLogger, type Logger } from '../logging.js';

export type ArchiveForwarderOptions = {
  /** Feed identifier the events are stored under */
  sessionId: FeedId;
  logger?: Logger;
};

export type ArchiveForwarder = {
  /** Subscribe this to the feed */
  handler: FeedHandler;
  /** Events waiting for the next flush */
  readonly pending: number;
  /**
   * Write all pending events in one batch.
   * On failure the batch stays pending and the error is rethrown.
   *
   * @returns the number of events written
   */
  flush(): Promise<number>;
};

export function createArchiveForwarder(
  archive: EventArchiveRepository,
  options: ArchiveForwarderOptions
): ArchiveForwarder {
  const logger = options.logger ?? silentLogger;
  const buffer: WireEvent[] = [];

  return {
    handler(event) {
      buffer.push(toWireEvent(event));
    },

    get pending() {
      return buffer.length;
    },

    async flush() {
      if (buffer.length === 0) return 0;

      const batch = buffer.splice(0, buffer.length);
      try {
        await archive.append(options.sessionId, batch);
      } catch (error) {
        // Keep order: the failed batch goes back before anything newer
        buffer.unshift(...batch);
        logger.error('Archive flush failed', {
          sessionId: options.sessionId,
          pending: buffer.length,
          error: errorMessage(error),
        });
        throw error;
      }

      logger.debug('Archived events', { sessionId: options.sessionId, count: batch.length });
      return batch.length;
    },
  };
}
