// Pull interface and subscription handshake of a session's event feed

import {
  FEED_VERSION,
  stringifyEventLog,
  toWireEvent,
  type LogisticsFeedService,
} from '@logitrace/protocol';
import type { LogisticsSession } from '../session/session.js';

/**
 * Expose a session as the service consumers look up by name. The service
 * stays bound to the session across resets; only the identifier changes.
 */
export function createFeedApi(session: LogisticsSession): LogisticsFeedService {
  return {
    getEventId: () => session.getEventId(),
    getEvents: (fromIndex) => session.getEvents(fromIndex),
    clearEvents: () => session.clearEvents(),
    getFeedVersion: () => FEED_VERSION,
    exportEvents: (fromIndex) => stringifyEventLog(session.getEvents(fromIndex).map(toWireEvent)),
    subscribe: (feedId, handler) => session.subscribe(feedId, handler),
    unsubscribe: (handler) => session.unsubscribe(handler),
  };
}
