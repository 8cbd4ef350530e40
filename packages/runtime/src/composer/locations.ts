// Actor and location constructors

import type {
  Actor,
  CraftingLocation,
  EntityHandle,
  EntityLocation,
  GroundLocation,
  LogisticNetworkLocation,
  PlayerHandle,
  PlayerInventoryLocation,
  RobotHandle,
  WorldLocation,
} from '@logitrace/protocol';

export const WORLD_LOCATION: WorldLocation = Object.freeze({ kind: 'world', id: 0, slotName: 'none' });

export const LOGISTIC_NETWORK_LOCATION: LogisticNetworkLocation = Object.freeze({
  kind: 'logistic-network',
  id: 0,
  slotName: 'storage',
});

/** Robots that fill monitored entities are not identified */
export const UNIDENTIFIED_ROBOT: Actor = Object.freeze({
  kind: 'logistic-robot',
  id: 0,
  name: 'construction-robot',
});

export function playerActor(player: PlayerHandle): Actor {
  return { kind: 'player-hand', id: player.index, name: player.name };
}

export function robotActor(robot: RobotHandle): Actor {
  return {
    kind: 'logistic-robot',
    id: robot.unitNumber ?? 0,
    name: robot.name || UNIDENTIFIED_ROBOT.name,
  };
}

export function playerInventoryLocation(playerIndex: number): PlayerInventoryLocation {
  return { kind: 'player-inventory', id: playerIndex, slotName: 'main' };
}

export function groundLocation(id = 0): GroundLocation {
  return { kind: 'ground', id, slotName: 'none' };
}

export function craftingLocation(playerIndex: number, recipeName: string): CraftingLocation {
  return { kind: 'crafting', id: playerIndex, slotName: recipeName };
}

export function entityLocation(entity: EntityHandle, slotName: string): EntityLocation {
  return {
    kind: 'entity',
    entityType: entity.type,
    id: entity.unitNumber ?? 0,
    slotName,
  };
}
