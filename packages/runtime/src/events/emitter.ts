// Event emitter - stamps, records and pushes logistics events

import type {
  Actor,
  FeedHandler,
  Item,
  Location,
  LogisticsAction,
  LogisticsEvent,
  Tick,
} from '@logitrace/protocol';
import type { EventLogRepository } from '@logitrace/repositories';
import { errorMessage, type Logger } from '../logging.js';

export type EventEmitterOptions = {
  log: EventLogRepository;
  /** Current world tick */
  clock: () => Tick;
  logger: Logger;
};

/**
 * Appends events to the session log and delivers them to subscribers
 * synchronously, in subscription order. There is no queueing: when `emit`
 * returns, every subscriber has seen the event.
 */
export class LogisticsEventEmitter {
  private subscribers = new Set<FeedHandler>();

  constructor(private options: EventEmitterOptions) {}

  emit(actor: Actor, action: LogisticsAction, location: Location, item: Item): LogisticsEvent {
    const event: LogisticsEvent = Object.freeze({
      tick: this.options.clock(),
      actor: Object.freeze({ ...actor }),
      action,
      location: Object.freeze({ ...location }),
      item: Object.freeze({ ...item }),
    });

    this.options.log.append(event);

    for (const handler of this.subscribers) {
      try {
        handler(event);
      } catch (error) {
        // One failing consumer must not starve the others
        this.options.logger.error('Feed subscriber failed', {
          error: errorMessage(error),
          action,
          tick: event.tick,
        });
      }
    }

    return event;
  }

  /**
   * TAKE from `from`, then GIVE to `to`: one movement as its two legs.
   */
  emitTransfer(actor: Actor, from: Location, to: Location, item: Item): [LogisticsEvent, LogisticsEvent] {
    return [this.emit(actor, 'TAKE', from, item), this.emit(actor, 'GIVE', to, item)];
  }

  /**
   * @returns false if the handler was already subscribed
   */
  subscribe(handler: FeedHandler): boolean {
    if (this.subscribers.has(handler)) return false;
    this.subscribers.add(handler);
    return true;
  }

  unsubscribe(handler: FeedHandler): boolean {
    return this.subscribers.delete(handler);
  }

  clearSubscribers(): void {
    this.subscribers.clear();
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }
}
