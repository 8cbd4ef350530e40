// Construction robot notification handlers

import { ITEM_ON_GROUND_TYPE, type CompositeSnapshot } from '@logitrace/protocol';
import { diffComposite, entriesWithSign } from '../inventory/delta.js';
import { snapshotEntity, snapshotInventory } from '../inventory/snapshot.js';
import { entityKeyOf } from '../session/state.js';
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
  LOGISTIC_NETWORK_LOCATION,
  entityLocation,
  groundLocation,
  robotActor,
} from './locations.js';

/**
 * Remember what the entity holds so the robot that later mines it can be
 * credited with what went missing in between.
 */
export const onMarkedForDeconstruction: NotificationHandler<'marked-for-deconstruction'> = (ctx, n) => {
  check(n.type, [[n.entity.valid, 'entity is not valid']]);
  ctx.entities.set(entityKeyOf(n.entity), snapshotEntity(n.entity, ctx.slotSpec));
};

export const onRobotPreMined: NotificationHandler<'robot-pre-mined'> = (ctx, n) => {
  const { entity, robot } = n;
  check(n.type, [
    [entity.valid, 'entity is not valid'],
    [robot.valid, 'robot is not valid'],
    [hasValidCount(entity.stack), INVALID_COUNT],
  ]);

  const actor = robotActor(robot);

  if (entity.type === ITEM_ON_GROUND_TYPE && isReadable(entity.stack)) {
    ctx.emitter.emitTransfer(actor, groundLocation(), LOGISTIC_NETWORK_LOCATION, itemFromStack(entity.stack));
    return;
  }

  const key = entityKeyOf(entity);
  const stored: CompositeSnapshot = ctx.entities.get(key) ?? new Map();
  const current = snapshotEntity(entity, ctx.slotSpec);

  for (const [slotName, delta] of diffComposite(stored, current)) {
    for (const [itemKey, change] of entriesWithSign(delta, -1)) {
      ctx.emitter.emitTransfer(
        actor,
        entityLocation(entity, slotName),
        LOGISTIC_NETWORK_LOCATION,
        itemOf(itemKey, -change)
      );
    }
  }

  ctx.entities.set(key, current);
};

export const onRobotMinedEntity: NotificationHandler<'robot-mined-entity'> = (ctx, n) => {
  const { entity, robot, buffer } = n;
  check(n.type, [
    [buffer.valid, 'buffer is not valid'],
    [robot.valid, 'robot is not valid'],
  ]);

  ctx.entities.delete(entityKeyOf(entity));

  const actor = robotActor(robot);
  const source = entityLocation(entity, 'mining');
  for (const [key, count] of snapshotInventory(buffer)) {
    ctx.emitter.emitTransfer(actor, source, LOGISTIC_NETWORK_LOCATION, itemOf(key, count));
  }
};

/**
 * The robot takes the entity's item from the network and places it. The new
 * entity starts out empty and is watched for robots filling it.
 */
export const onRobotBuiltEntity: NotificationHandler<'robot-built-entity'> = (ctx, n) => {
  const { entity, robot, stack } = n;
  check(n.type, [
    [entity.valid, 'entity is not valid'],
    [robot.valid, 'robot is not valid'],
    [stack.validForRead, 'item stack is empty'],
    [hasValidCount(stack), INVALID_COUNT],
  ]);

  ctx.emitter.emitTransfer(
    robotActor(robot),
    LOGISTIC_NETWORK_LOCATION,
    entityLocation(entity, 'building'),
    itemFromStack(stack)
  );

  ctx.entities.set(entityKeyOf(entity), new Map());
  ctx.watchlist.watch(entity, ctx.clock());
};
