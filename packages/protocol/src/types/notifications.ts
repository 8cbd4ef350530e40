// Inbound notification types - raw world changes delivered by the host

import type { Tick } from './common.js';
import type {
  EntityHandle,
  InventoryHandle,
  ItemStackHandle,
  PlayerHandle,
  RecipeInfo,
  RobotHandle,
} from './host.js';

type PlayerNotification = {
  tick: Tick;
  player: PlayerHandle;
};

type RobotNotification = {
  tick: Tick;
  robot: RobotHandle;
};

/** Player opened their own inventory screen */
export type PlayerOpenedInventory = PlayerNotification & {
  type: 'player-opened-inventory';
};

/** Player opened the GUI of an entity */
export type PlayerOpenedContainer = PlayerNotification & {
  type: 'player-opened-container';
  entity: EntityHandle;
};

/** Player closed an entity GUI */
export type PlayerClosedContainer = PlayerNotification & {
  type: 'player-closed-container';
};

/** The player's hand (cursor stack) changed; read the new value from the player */
export type CursorStackChanged = PlayerNotification & {
  type: 'cursor-stack-changed';
};

/** Quick transfer between the player and an entity. Fires after the transfer. */
export type FastTransferred = PlayerNotification & {
  type: 'fast-transferred';
  entity: EntityHandle;
  /** True when items went from the player into the entity */
  fromPlayer: boolean;
};

/** Player dropped items; `entity` is the new item-on-ground entity */
export type PlayerDroppedItem = PlayerNotification & {
  type: 'player-dropped-item';
  entity: EntityHandle;
};

export type PlayerPickedUpItem = PlayerNotification & {
  type: 'player-picked-up-item';
  itemStack: ItemStackHandle;
};

export type PlayerCraftedItem = PlayerNotification & {
  type: 'player-crafted-item';
  itemStack: ItemStackHandle;
  recipe: RecipeInfo;
};

/** Player is about to mine an entity; its contents are still readable */
export type PrePlayerMinedItem = PlayerNotification & {
  type: 'pre-player-mined-item';
  entity: EntityHandle;
};

/** Player mined an entity; `buffer` holds what the player received */
export type PlayerMinedEntity = PlayerNotification & {
  type: 'player-mined-entity';
  entity: EntityHandle;
  buffer: InventoryHandle;
};

export type MarkedForDeconstruction = {
  type: 'marked-for-deconstruction';
  tick: Tick;
  entity: EntityHandle;
};

export type RobotPreMined = RobotNotification & {
  type: 'robot-pre-mined';
  entity: EntityHandle;
};

export type RobotMinedEntity = RobotNotification & {
  type: 'robot-mined-entity';
  entity: EntityHandle;
  buffer: InventoryHandle;
};

/** Robot placed an entity; `stack` is the item used to build it */
export type RobotBuiltEntity = RobotNotification & {
  type: 'robot-built-entity';
  entity: EntityHandle;
  stack: ItemStackHandle;
};

export type WorldNotification =
  | PlayerOpenedInventory
  | PlayerOpenedContainer
  | PlayerClosedContainer
  | CursorStackChanged
  | FastTransferred
  | PlayerDroppedItem
  | PlayerPickedUpItem
  | PlayerCraftedItem
  | PrePlayerMinedItem
  | PlayerMinedEntity
  | MarkedForDeconstruction
  | RobotPreMined
  | RobotMinedEntity
  | RobotBuiltEntity;

export type WorldNotificationType = WorldNotification['type'];

/**
 * Select a notification variant by its type tag.
 */
export type NotificationOf<T extends WorldNotificationType> = Extract<
  WorldNotification,
  { type: T }
>;
