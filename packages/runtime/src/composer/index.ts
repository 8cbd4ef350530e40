// Transaction composer - turns world notifications into logistics events

import type { WorldNotification } from '@logitrace/protocol';
import type { ComposerContext } from './context.js';
import {
  onCursorStackChanged,
  onFastTransferred,
  onPlayerClosedContainer,
  onPlayerCraftedItem,
  onPlayerDroppedItem,
  onPlayerMinedEntity,
  onPlayerOpenedContainer,
  onPlayerOpenedInventory,
  onPlayerPickedUpItem,
  onPrePlayerMinedItem,
} from './player.js';
import {
  onMarkedForDeconstruction,
  onRobotBuiltEntity,
  onRobotMinedEntity,
  onRobotPreMined,
} from './robots.js';

/**
 * Dispatch a notification to its handler.
 *
 * @throws MalformedNotificationError when a precondition of the notification
 * does not hold; nothing has been emitted in that case
 */
export function composeNotification(ctx: ComposerContext, notification: WorldNotification): void {
  switch (notification.type) {
    case 'player-opened-inventory':
      return onPlayerOpenedInventory(ctx, notification);
    case 'player-opened-container':
      return onPlayerOpenedContainer(ctx, notification);
    case 'player-closed-container':
      return onPlayerClosedContainer(ctx, notification);
    case 'cursor-stack-changed':
      return onCursorStackChanged(ctx, notification);
    case 'fast-transferred':
      return onFastTransferred(ctx, notification);
    case 'player-dropped-item':
      return onPlayerDroppedItem(ctx, notification);
    case 'player-picked-up-item':
      return onPlayerPickedUpItem(ctx, notification);
    case 'player-crafted-item':
      return onPlayerCraftedItem(ctx, notification);
    case 'pre-player-mined-item':
      return onPrePlayerMinedItem(ctx, notification);
    case 'player-mined-entity':
      return onPlayerMinedEntity(ctx, notification);
    case 'marked-for-deconstruction':
      return onMarkedForDeconstruction(ctx, notification);
    case 'robot-pre-mined':
      return onRobotPreMined(ctx, notification);
    case 'robot-mined-entity':
      return onRobotMinedEntity(ctx, notification);
    case 'robot-built-entity':
      return onRobotBuiltEntity(ctx, notification);
  }
}

export type { ComposerContext, NotificationHandler } from './context.js';
export * from './locations.js';
