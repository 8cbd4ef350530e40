// Composer context - the session state a notification handler works on

import type {
  Item,
  ItemKey,
  ItemStackHandle,
  NotificationOf,
  Tick,
  WorldNotificationType,
} from '@logitrace/protocol';
import type { LogisticsEventEmitter } from '../events/emitter.js';
import type { SlotSpec } from '../inventory/slots.js';
import type { Logger } from '../logging.js';
import type { Watchlist } from '../monitoring/watchlist.js';
import type { ActorStateStore, EntitySnapshotStore } from '../session/state.js';
import { MalformedNotificationError } from '../errors.js';
import { decodeItemKey, normalizeQuality } from '../items/codec.js';

export type ComposerContext = {
  emitter: LogisticsEventEmitter;
  actors: ActorStateStore;
  entities: EntitySnapshotStore;
  watchlist: Watchlist;
  slotSpec: SlotSpec;
  logger: Logger;
  /** Current session tick */
  clock: () => Tick;
};

/**
 * Handler for one notification type. Handlers validate everything they need
 * before emitting, so a rejected notification leaves no partial events.
 */
export type NotificationHandler<T extends WorldNotificationType> = (
  ctx: ComposerContext,
  notification: NotificationOf<T>
) => void;

/**
 * Collects missing preconditions of a notification and throws them together.
 */
export function check(type: WorldNotificationType, conditions: Array<[boolean, string]>): void {
  const issues = conditions.filter(([ok]) => !ok).map(([, issue]) => issue);
  if (issues.length > 0) {
    throw new MalformedNotificationError(type, issues);
  }
}

export function itemOf(key: ItemKey, quantity: number): Item {
  const [name, quality] = decodeItemKey(key);
  return { name, quantity, quality };
}

export function itemFromStack(stack: ItemStackHandle): Item {
  return { name: stack.name, quantity: stack.count, quality: normalizeQuality(stack.quality) };
}

/**
 * True for a stack with something in it.
 */
export function isReadable(stack: ItemStackHandle | undefined): stack is ItemStackHandle {
  return stack !== undefined && stack.validForRead;
}

/**
 * False for a readable stack whose count is not a positive whole number.
 * Unreadable and absent stacks have no count to check.
 */
export function hasValidCount(stack: ItemStackHandle | undefined): boolean {
  return !isReadable(stack) || (Number.isInteger(stack.count) && stack.count > 0);
}

export const INVALID_COUNT = 'item stack count is not a positive integer';
