// Player notification handlers

import {
  DEFAULT_QUALITY,
  ITEM_ON_GROUND_TYPE,
  type EntityHandle,
  type ItemKey,
  type Location,
} from '@logitrace/protocol';
import { MalformedNotificationError } from '../errors.js';
import { itemKeyFromStack } from '../items/codec.js';
import { diffSnapshots, entriesWithSign } from '../inventory/delta.js';
import { listEntityContainers, snapshotInventory } from '../inventory/snapshot.js';
import { FALLBACK_SLOT_NAME } from '../inventory/slots.js';
import { resolveInventoryChange, type ExpectedSign } from '../inference/resolver.js';
import { entityKeyOf, type ActorObservationState } from '../session/state.js';
import {
  INVALID_COUNT,
  check,
  hasValidCount,
  isReadable,
  itemFromStack,
  itemOf,
  type NotificationHandler,
} from './context.js';
import {
  WORLD_LOCATION,
  craftingLocation,
  entityLocation,
  groundLocation,
  playerActor,
  playerInventoryLocation,
} from './locations.js';

export const onPlayerOpenedInventory: NotificationHandler<'player-opened-inventory'> = (ctx, { player }) => {
  ctx.actors.get(player.index).mainInventory = snapshotInventory(player.getMainInventory());
};

export const onPlayerOpenedContainer: NotificationHandler<'player-opened-container'> = (ctx, n) => {
  check(n.type, [[n.entity.valid, 'entity is not valid']]);

  ctx.actors.get(n.player.index).openContainer = {
    entity: n.entity,
    containers: listEntityContainers(n.entity, ctx.slotSpec).map((container) => ({
      ...container,
      snapshot: snapshotInventory(container.inventory),
    })),
  };
};

export const onPlayerClosedContainer: NotificationHandler<'player-closed-container'> = (ctx, { player }) => {
  ctx.actors.get(player.index).openContainer = undefined;
};

/**
 * Hand transitions. The hand state is saved afterwards whatever was emitted.
 */
export const onCursorStackChanged: NotificationHandler<'cursor-stack-changed'> = (ctx, n) => {
  const { player } = n;
  const stack = player.cursorStack;
  check(n.type, [[hasValidCount(stack), INVALID_COUNT]]);

  const state = ctx.actors.get(player.index);
  const actor = playerActor(player);
  const before = state.hand;
  const key = itemKeyFromStack(stack);
  const after = key && stack ? { key, count: stack.count } : undefined;

  // Where did `key` go to or come from, and how much of it
  const locate = (itemKey: ItemKey, sign: ExpectedSign, fallbackQuantity: number) => {
    const resolved = resolveInventoryChange(player, state, itemKey, sign);
    return resolved ?? { location: WORLD_LOCATION, quantity: fallbackQuantity };
  };

  if (!before && after) {
    const { location, quantity } = locate(after.key, -1, after.count);
    ctx.emitter.emit(actor, 'TAKE', location, itemOf(after.key, quantity));
  } else if (before && !after) {
    const { location, quantity } = locate(before.key, 1, before.count);
    ctx.emitter.emit(actor, 'GIVE', location, itemOf(before.key, quantity));
  } else if (before && after && before.key === after.key) {
    const change = after.count - before.count;
    if (change > 0) {
      const { location, quantity } = locate(after.key, -1, change);
      ctx.emitter.emit(actor, 'TAKE', location, itemOf(after.key, quantity));
    } else if (change < 0) {
      const { location, quantity } = locate(after.key, 1, -change);
      ctx.emitter.emit(actor, 'GIVE', location, itemOf(after.key, quantity));
    }
  } else if (before && after) {
    // Swap: the old item is put down before the new one is picked up
    const given = locate(before.key, 1, before.count);
    ctx.emitter.emit(actor, 'GIVE', given.location, itemOf(before.key, given.quantity));
    const taken = locate(after.key, -1, after.count);
    ctx.emitter.emit(actor, 'TAKE', taken.location, itemOf(after.key, taken.quantity));
  }

  state.hand = after;
};

/**
 * Quick transfer. The host reports only the direction, so what moved is read
 * off the player's main inventory; the entity side is booked on the first
 * slot the entity exposes.
 */
export const onFastTransferred: NotificationHandler<'fast-transferred'> = (ctx, n) => {
  const { player, entity } = n;
  check(n.type, [[entity.valid, 'entity is not valid']]);

  const state = ctx.actors.get(player.index);
  const actor = playerActor(player);
  const fresh = snapshotInventory(player.getMainInventory());
  const delta = diffSnapshots(state.mainInventory, fresh);
  const slotName = listEntityContainers(entity, ctx.slotSpec)[0]?.slotName ?? FALLBACK_SLOT_NAME;
  const playerSide = playerInventoryLocation(player.index);
  const entitySide = entityLocation(entity, slotName);

  if (n.fromPlayer) {
    for (const [key, change] of entriesWithSign(delta, -1)) {
      ctx.emitter.emitTransfer(actor, playerSide, entitySide, itemOf(key, -change));
    }
  } else {
    for (const [key, change] of entriesWithSign(delta, 1)) {
      ctx.emitter.emitTransfer(actor, entitySide, playerSide, itemOf(key, change));
    }
  }

  state.mainInventory = fresh;
  refreshOpenContainer(state, entity);
};

export const onPlayerDroppedItem: NotificationHandler<'player-dropped-item'> = (ctx, n) => {
  const { player, entity } = n;
  const stack = entity.stack;
  if (!entity.valid || !isReadable(stack)) {
    throw new MalformedNotificationError(n.type, ['dropped entity has no readable item stack']);
  }
  check(n.type, [[hasValidCount(stack), INVALID_COUNT]]);

  ctx.emitter.emitTransfer(
    playerActor(player),
    playerInventoryLocation(player.index),
    groundLocation(entity.unitNumber ?? 0),
    itemFromStack(stack)
  );
};

export const onPlayerPickedUpItem: NotificationHandler<'player-picked-up-item'> = (ctx, n) => {
  const { player, itemStack } = n;
  check(n.type, [
    [itemStack.validForRead, 'item stack is empty'],
    [hasValidCount(itemStack), INVALID_COUNT],
  ]);

  ctx.emitter.emitTransfer(
    playerActor(player),
    groundLocation(),
    playerInventoryLocation(player.index),
    itemFromStack(itemStack)
  );
};

/**
 * Retrograde booking of a hand craft: ingredients move into a virtual
 * crafting location, a MAKE marks the transformation, the product moves out.
 * The host reports only the result, so ingredient quantities come from the
 * recipe and ingredient quality is always the default.
 */
export const onPlayerCraftedItem: NotificationHandler<'player-crafted-item'> = (ctx, n) => {
  const { player, itemStack, recipe } = n;
  check(n.type, [
    [itemStack.validForRead, 'item stack is empty'],
    [hasValidCount(itemStack), INVALID_COUNT],
    [recipe.name.length > 0, 'recipe has no name'],
  ]);

  const actor = playerActor(player);
  const inventory = playerInventoryLocation(player.index);
  const crafting = craftingLocation(player.index, recipe.name);

  for (const ingredient of recipe.ingredients) {
    if (!ingredient.name) continue;
    ctx.emitter.emitTransfer(actor, inventory, crafting, {
      name: ingredient.name,
      quantity: ingredient.amount * itemStack.count,
      quality: DEFAULT_QUALITY,
    });
  }

  const product = itemFromStack(itemStack);
  ctx.emitter.emit(actor, 'MAKE', crafting, product);
  ctx.emitter.emitTransfer(actor, crafting, inventory, product);
};

/**
 * The entity is still intact: book everything it holds as moving into the
 * player's inventory.
 */
export const onPrePlayerMinedItem: NotificationHandler<'pre-player-mined-item'> = (ctx, n) => {
  const { player, entity } = n;
  check(n.type, [
    [entity.valid, 'entity is not valid'],
    [hasValidCount(entity.stack), INVALID_COUNT],
  ]);

  const actor = playerActor(player);
  const inventory = playerInventoryLocation(player.index);

  if (entity.type === ITEM_ON_GROUND_TYPE && isReadable(entity.stack)) {
    ctx.emitter.emitTransfer(actor, groundLocation(), inventory, itemFromStack(entity.stack));
    return;
  }

  for (const { slotName, inventory: container } of listEntityContainers(entity, ctx.slotSpec)) {
    for (const [key, count] of snapshotInventory(container)) {
      ctx.emitter.emitTransfer(actor, entityLocation(entity, slotName), inventory, itemOf(key, count));
    }
  }
};

export const onPlayerMinedEntity: NotificationHandler<'player-mined-entity'> = (ctx, n) => {
  const { player, entity, buffer } = n;
  check(n.type, [[buffer.valid, 'buffer is not valid']]);

  const actor = playerActor(player);
  const source: Location = entityLocation(entity, 'mining');
  const target = playerInventoryLocation(player.index);

  for (const [key, count] of snapshotInventory(buffer)) {
    ctx.emitter.emitTransfer(actor, source, target, itemOf(key, count));
  }
};

/**
 * Re-read an open entity after something other than the hand changed it.
 * The host may hand over a fresh handle for the same entity, so handles are
 * matched by entity key.
 */
function refreshOpenContainer(state: ActorObservationState, entity: EntityHandle): void {
  const open = state.openContainer;
  if (!open || entityKeyOf(open.entity) !== entityKeyOf(entity)) return;
  for (const container of open.containers) {
    container.snapshot = snapshotInventory(container.inventory);
  }
}
