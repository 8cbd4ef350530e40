// Notification ingestion - validates what the host hands the engine
//
// Handles are live host objects: they are checked structurally and passed
// through by reference, never copied.

import { z } from 'zod';
import type {
  EntityHandle,
  InventoryHandle,
  ItemStackHandle,
  PlayerHandle,
  RobotHandle,
  WorldNotification,
} from '@logitrace/protocol';
import { MalformedNotificationError } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isPosition(value: unknown): boolean {
  return isRecord(value) && typeof value.x === 'number' && typeof value.y === 'number';
}

export function isItemStackHandle(value: unknown): value is ItemStackHandle {
  return (
    isRecord(value) &&
    typeof value.validForRead === 'boolean' &&
    typeof value.name === 'string' &&
    typeof value.count === 'number'
  );
}

export function isInventoryHandle(value: unknown): value is InventoryHandle {
  return (
    isRecord(value) &&
    typeof value.valid === 'boolean' &&
    typeof value.index === 'number' &&
    typeof value.getContents === 'function'
  );
}

export function isEntityHandle(value: unknown): value is EntityHandle {
  return (
    isRecord(value) &&
    typeof value.valid === 'boolean' &&
    typeof value.type === 'string' &&
    typeof value.name === 'string' &&
    isPosition(value.position) &&
    typeof value.getInventory === 'function' &&
    (value.unitNumber === undefined || typeof value.unitNumber === 'number') &&
    (value.stack === undefined || isItemStackHandle(value.stack))
  );
}

export function isPlayerHandle(value: unknown): value is PlayerHandle {
  return (
    isRecord(value) &&
    typeof value.index === 'number' &&
    typeof value.name === 'string' &&
    typeof value.getMainInventory === 'function' &&
    (value.cursorStack === undefined || isItemStackHandle(value.cursorStack))
  );
}

export function isRobotHandle(value: unknown): value is RobotHandle {
  return (
    isRecord(value) &&
    typeof value.valid === 'boolean' &&
    (value.unitNumber === undefined || typeof value.unitNumber === 'number') &&
    (value.name === undefined || typeof value.name === 'string')
  );
}

// --- Schemas ---

const tick = z.number().int().nonnegative();
const player = z.custom<PlayerHandle>(isPlayerHandle, 'expected a player handle');
const entity = z.custom<EntityHandle>(isEntityHandle, 'expected an entity handle');
const robot = z.custom<RobotHandle>(isRobotHandle, 'expected a robot handle');
const itemStack = z.custom<ItemStackHandle>(isItemStackHandle, 'expected an item stack');
const buffer = z.custom<InventoryHandle>(isInventoryHandle, 'expected an inventory handle');

const RecipeSchema = z.object({
  name: z.string().min(1),
  ingredients: z.array(
    z.object({
      name: z.string().optional(),
      amount: z.number().int().positive(),
    })
  ),
});

const playerNotification = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), tick, player });

const robotNotification = <T extends string>(type: T) =>
  z.object({ type: z.literal(type), tick, robot });

const NotificationSchema = z.discriminatedUnion('type', [
  playerNotification('player-opened-inventory'),
  playerNotification('player-opened-container').extend({ entity }),
  playerNotification('player-closed-container'),
  playerNotification('cursor-stack-changed'),
  playerNotification('fast-transferred').extend({ entity, fromPlayer: z.boolean() }),
  playerNotification('player-dropped-item').extend({ entity }),
  playerNotification('player-picked-up-item').extend({ itemStack }),
  playerNotification('player-crafted-item').extend({ itemStack, recipe: RecipeSchema }),
  playerNotification('pre-player-mined-item').extend({ entity }),
  playerNotification('player-mined-entity').extend({ entity, buffer }),
  z.object({ type: z.literal('marked-for-deconstruction'), tick, entity }),
  robotNotification('robot-pre-mined').extend({ entity }),
  robotNotification('robot-mined-entity').extend({ entity, buffer }),
  robotNotification('robot-built-entity').extend({ entity, stack: itemStack }),
]);

/**
 * Validate an untrusted notification.
 *
 * @throws MalformedNotificationError listing every missing or mistyped field
 */
export function parseNotification(input: unknown): WorldNotification {
  const result = NotificationSchema.safeParse(input);
  if (!result.success) {
    const type = isRecord(input) && typeof input.type === 'string' ? input.type : 'unknown';
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new MalformedNotificationError(type, issues);
  }
  return result.data;
}
