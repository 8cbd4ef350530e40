// Logistics session - owns all observation state of one simulation run
//
// Construct one per session. `reset()` is the only way state is dropped:
// per-player observations, entity baselines, the watchlist, the event log and
// every subscription go together, and a new feed identifier is issued.

import { randomUUID } from 'node:crypto';
import type { FeedHandler, FeedId, LogisticsEvent, Tick } from '@logitrace/protocol';
import { createInMemoryEventLog, type EventLogRepository } from '@logitrace/repositories';
import { composeNotification, type ComposerContext } from '../composer/index.js';
import { resolveConfig, type TrackerConfig, type TrackerConfigInput } from '../config.js';
import { FeedIdentifierError, MalformedNotificationError } from '../errors.js';
import { LogisticsEventEmitter } from '../events/emitter.js';
import { parseNotification } from '../ingestion/notification.js';
import { DEFAULT_SLOT_SPEC, type SlotSpec } from '../inventory/slots.js';
import { consoleLogger, type Logger } from '../logging.js';
import { Watchlist, type ScanResult } from '../monitoring/watchlist.js';
import { ActorStateStore, EntitySnapshotStore } from './state.js';

export type LogisticsSessionOptions = {
  config?: TrackerConfigInput;
  logger?: Logger;
  /** Event log storage (default: in memory) */
  log?: EventLogRepository;
  slotSpec?: SlotSpec;
  /** Source of feed identifiers (default: random UUIDs) */
  createFeedId?: () => FeedId;
};

export class LogisticsSession {
  private _config: TrackerConfig;
  private _feedId: FeedId;
  private currentTick: Tick = 0;

  private readonly logger: Logger;
  private readonly log: EventLogRepository;
  private readonly createFeedId: () => FeedId;
  private readonly actors = new ActorStateStore();
  private readonly entities = new EntitySnapshotStore();
  private readonly emitter: LogisticsEventEmitter;
  private readonly watchlist: Watchlist;
  private readonly ctx: ComposerContext;

  /**
   * @throws ConfigurationError for invalid configuration values
   */
  constructor(options: LogisticsSessionOptions = {}) {
    this._config = resolveConfig(options.config);
    this.logger = options.logger ?? consoleLogger;
    this.log = options.log ?? createInMemoryEventLog();
    this.createFeedId = options.createFeedId ?? randomUUID;
    this._feedId = this.createFeedId();

    const clock = () => this.currentTick;
    const slotSpec = options.slotSpec ?? DEFAULT_SLOT_SPEC;

    this.emitter = new LogisticsEventEmitter({ log: this.log, clock, logger: this.logger });
    this.watchlist = new Watchlist({
      emitter: this.emitter,
      entities: this.entities,
      slotSpec,
      logger: this.logger,
      scanIntervalTicks: this._config.scanIntervalTicks,
      quiescenceWindowTicks: this._config.quiescenceWindowTicks,
    });
    this.ctx = {
      emitter: this.emitter,
      actors: this.actors,
      entities: this.entities,
      watchlist: this.watchlist,
      slotSpec,
      logger: this.logger,
      clock,
    };

    this.logger.info('Logistics session initialized', { feedId: this._feedId });
  }

  get config(): TrackerConfig {
    return this._config;
  }

  get tick(): Tick {
    return this.currentTick;
  }

  /** Number of entities polled for robot fills */
  get watchedEntities(): number {
    return this.watchlist.size;
  }

  // --- Inbound ---

  /**
   * Compose one host notification into events.
   * Malformed notifications are dropped without emitting anything.
   *
   * @returns true if the notification was accepted
   */
  handle(input: unknown): boolean {
    try {
      const notification = parseNotification(input);
      this.advance(notification.tick);
      composeNotification(this.ctx, notification);
      return true;
    } catch (error) {
      if (error instanceof MalformedNotificationError) {
        this.logger.debug('Dropped malformed notification', {
          type: error.notificationType,
          issues: error.issues,
        });
        return false;
      }
      throw error;
    }
  }

  /**
   * Drive the watchlist. Call once per simulation step.
   */
  onTick(tick: Tick): ScanResult | undefined {
    this.advance(tick);
    return this.watchlist.onTick(this.currentTick);
  }

  // --- Feed ---

  getEventId(): FeedId {
    return this._feedId;
  }

  /**
   * Subscribe to pushed events. Subscribing a handler that is already
   * subscribed has no effect.
   *
   * @throws FeedIdentifierError if `feedId` is not this session's identifier
   */
  subscribe(feedId: FeedId, handler: FeedHandler): void {
    if (feedId !== this._feedId) {
      throw new FeedIdentifierError(feedId);
    }
    this.emitter.subscribe(handler);
  }

  unsubscribe(handler: FeedHandler): boolean {
    return this.emitter.unsubscribe(handler);
  }

  /**
   * Events at or after a 1-based index. A missing, fractional or
   * non-positive index reads from the start.
   */
  getEvents(fromIndex = 1): LogisticsEvent[] {
    const start = Number.isInteger(fromIndex) && fromIndex >= 1 ? fromIndex : 1;
    return this.log.readFrom(start);
  }

  clearEvents(): void {
    const cleared = this.log.size();
    this.log.clear();
    this.logger.info('Event log cleared', { cleared });
  }

  get eventCount(): number {
    return this.log.size();
  }

  // --- Lifecycle ---

  /**
   * Start a new session: drop all state and subscriptions and issue a new
   * feed identifier. Consumers must look the identifier up again.
   */
  reset(): FeedId {
    this.actors.clear();
    this.entities.clear();
    this.watchlist.clear();
    this.emitter.clearSubscribers();
    this.log.clear();
    this.currentTick = 0;
    this._feedId = this.createFeedId();

    this.logger.info('Logistics session reset', { feedId: this._feedId });
    return this._feedId;
  }

  /**
   * Apply new configuration values on top of the current ones. Observation
   * state and subscriptions are kept.
   *
   * @throws ConfigurationError for invalid values; the old configuration stays
   */
  reconfigure(overrides: TrackerConfigInput): TrackerConfig {
    this._config = resolveConfig({
      scanIntervalTicks: overrides.scanIntervalTicks ?? this._config.scanIntervalTicks,
      quiescenceWindowTicks: overrides.quiescenceWindowTicks ?? this._config.quiescenceWindowTicks,
      serviceName: overrides.serviceName ?? this._config.serviceName,
    });
    this.watchlist.retime(this._config);

    this.logger.info('Logistics session reconfigured', {
      feedId: this._feedId,
      scanIntervalTicks: this._config.scanIntervalTicks,
      quiescenceWindowTicks: this._config.quiescenceWindowTicks,
    });
    return this._config;
  }

  private advance(tick: Tick): void {
    // Ticks never run backwards within a session
    this.currentTick = Math.max(this.currentTick, tick);
  }
}
