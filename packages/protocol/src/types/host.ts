// Host handle types
//
// The simulation host owns the world. These are the minimal views of its live
// objects that the inference engine reads. Handles may become invalid at any
// time (entity destroyed, GUI closed), so every read checks `valid`.

/**
 * One content line of a container. Hosts may report several lines for the
 * same name and quality.
 */
export type ItemCount = {
  name: string;
  count: number;
  quality?: string;
};

/**
 * Inventory roles an entity can expose.
 */
export type InventoryRole =
  | 'chest'
  | 'furnace_source'
  | 'furnace_result'
  | 'furnace_modules'
  | 'assembling_machine_input'
  | 'assembling_machine_output'
  | 'assembling_machine_modules'
  | 'lab_input'
  | 'lab_modules'
  | 'mining_drill_modules'
  | 'rocket_silo_input'
  | 'rocket_silo_output'
  | 'rocket_silo_modules'
  | 'beacon_modules'
  | 'fuel'
  | 'burnt_result';

export interface InventoryHandle {
  readonly valid: boolean;
  /**
   * Identity of the container within its owner. Two roles that resolve to
   * the same underlying container report the same index.
   */
  readonly index: number;
  getContents(): readonly ItemCount[];
}

export interface ItemStackHandle {
  /** False for an empty stack */
  readonly validForRead: boolean;
  readonly name: string;
  readonly count: number;
  readonly quality?: string;
}

export type Position = {
  x: number;
  y: number;
};

export interface EntityHandle {
  readonly valid: boolean;
  /** Type tag, e.g. "container", "assembling-machine", "item-entity" */
  readonly type: string;
  readonly name: string;
  readonly unitNumber?: number;
  readonly position: Position;
  /** Present on item-on-ground entities */
  readonly stack?: ItemStackHandle;
  getInventory(role: InventoryRole): InventoryHandle | undefined;
}

export interface PlayerHandle {
  readonly index: number;
  readonly name: string;
  readonly cursorStack?: ItemStackHandle;
  getMainInventory(): InventoryHandle | undefined;
}

export interface RobotHandle {
  readonly valid: boolean;
  readonly unitNumber?: number;
  readonly name?: string;
}

export type RecipeIngredient = {
  name?: string;
  amount: number;
};

export type RecipeInfo = {
  name: string;
  ingredients: readonly RecipeIngredient[];
};

/**
 * Type tag of entities that represent an item lying on the ground.
 */
export const ITEM_ON_GROUND_TYPE = 'item-entity';
