// Service directory - in-process capability lookup by well-known name

import type { FeedHandler, FeedId, LogisticsFeedService } from '@logitrace/protocol';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { LogisticsSession } from '../session/session.js';
import { createFeedApi } from './api.js';

export class ServiceDirectory {
  private services = new Map<string, LogisticsFeedService>();

  constructor(private logger: Logger = silentLogger) {}

  /**
   * Register a service under a name. A name is never taken over: when it is
   * already registered the existing service stays.
   *
   * @returns false if the name was already registered
   */
  register(name: string, service: LogisticsFeedService): boolean {
    if (this.services.has(name)) {
      this.logger.warn('Service name already registered', { name });
      return false;
    }
    this.services.set(name, service);
    this.logger.info('Service registered', { name });
    return true;
  }

  lookup(name: string): LogisticsFeedService | undefined {
    return this.services.get(name);
  }

  unregister(name: string): boolean {
    return this.services.delete(name);
  }

  names(): string[] {
    return [...this.services.keys()];
  }
}

/**
 * Register a session's feed under its configured service name.
 */
export function publishFeed(directory: ServiceDirectory, session: LogisticsSession): boolean {
  return directory.register(session.config.serviceName, createFeedApi(session));
}

/**
 * Consumer side of the handshake: look the feed up, read its current
 * identifier and subscribe with it. Repeat after the producing session
 * resets.
 *
 * @returns the identifier subscribed to, or undefined when no feed is
 * registered under the name yet
 */
export function connectToFeed(
  directory: ServiceDirectory,
  serviceName: string,
  handler: FeedHandler
): FeedId | undefined {
  const service = directory.lookup(serviceName);
  if (!service) return undefined;

  const feedId = service.getEventId();
  service.subscribe(feedId, handler);
  return feedId;
}
