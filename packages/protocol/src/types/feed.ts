// Feed types - what consumers of the event stream see

import type { Tick } from './common.js';
import type { ActorKind, LogisticsAction, LogisticsEvent } from './events.js';

/**
 * Schema version of the event feed. Bumped on any breaking change to
 * `WireEvent`.
 */
export const FEED_VERSION = 1;

/**
 * Well-known capability name under which the feed is registered.
 */
export const DEFAULT_SERVICE_NAME = 'logistics_events_api';

/**
 * Identifier of a feed instance. A new one is issued every session, so
 * identifiers from a previous session are stale.
 */
export type FeedId = string;

/**
 * Callback receiving each event synchronously in emission order.
 */
export type FeedHandler = (event: LogisticsEvent) => void;

/**
 * Flat record of an event as published to external consumers (version 1).
 * For entity locations `type` is the entity's own type tag; for every other
 * location it is the location kind.
 */
export type WireEvent = {
  tick: Tick;
  actor: {
    type: ActorKind;
    id: number;
    name: string;
  };
  action: LogisticsAction;
  source_or_target: {
    type: string;
    id: number;
    slot_name: string;
  };
  item: {
    name: string;
    quantity: number;
    quality: string;
  };
};

/**
 * Pull interface of the feed, registered under the service name.
 */
export interface LogisticsFeedApi {
  /** Identifier to subscribe with for the current session */
  getEventId(): FeedId;
  /** All events at or after a 1-based index (default 1) */
  getEvents(fromIndex?: number): LogisticsEvent[];
  /** Truncate the event log */
  clearEvents(): void;
  getFeedVersion(): number;
  /** Events at or after a 1-based index as NDJSON wire records */
  exportEvents(fromIndex?: number): string;
}

/**
 * The feed as registered in a service directory: the pull interface plus
 * the push subscription handshake.
 */
export interface LogisticsFeedService extends LogisticsFeedApi {
  /**
   * Push every future event to `handler`. Subscribing the same handler twice
   * has no effect.
   * @throws if `feedId` is not the current identifier
   */
  subscribe(feedId: FeedId, handler: FeedHandler): void;
  unsubscribe(handler: FeedHandler): boolean;
}
