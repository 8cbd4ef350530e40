// Logistics event types - the output stream

import type { Tick } from './common.js';
import type { Item } from './items.js';

/**
 * TAKE removes an item from a location into the actor's possession,
 * GIVE deposits it into a location, MAKE marks a production step at a
 * crafting location.
 */
export type LogisticsAction = 'TAKE' | 'GIVE' | 'MAKE';

export type ActorKind = 'player-hand' | 'logistic-robot';

/**
 * Who performed the movement.
 */
export type Actor = {
  readonly kind: ActorKind;
  readonly id: number;
  readonly name: string;
};

/**
 * A container slot of a placed entity. `entityType` is the host's type tag
 * (e.g. "assembling-machine").
 */
export type EntityLocation = {
  readonly kind: 'entity';
  readonly entityType: string;
  readonly id: number;
  readonly slotName: string;
};

export type PlayerInventoryLocation = {
  readonly kind: 'player-inventory';
  /** Player index */
  readonly id: number;
  readonly slotName: 'main';
};

export type GroundLocation = {
  readonly kind: 'ground';
  /** Item-on-ground entity id, 0 when unknown */
  readonly id: number;
  readonly slotName: 'none';
};

export type LogisticNetworkLocation = {
  readonly kind: 'logistic-network';
  readonly id: number;
  readonly slotName: 'storage';
};

export type CraftingLocation = {
  readonly kind: 'crafting';
  /** Player index of the crafter */
  readonly id: number;
  /** Recipe name */
  readonly slotName: string;
};

/**
 * Unobserved location. Used when no tracked container explains a change.
 */
export type WorldLocation = {
  readonly kind: 'world';
  readonly id: 0;
  readonly slotName: 'none';
};

export type Location =
  | EntityLocation
  | PlayerInventoryLocation
  | GroundLocation
  | LogisticNetworkLocation
  | CraftingLocation
  | WorldLocation;

export type LocationKind = Location['kind'];

/**
 * An immutable logistics event. Events are appended to the session log and
 * addressed by their 1-based position in it.
 */
export type LogisticsEvent = {
  readonly tick: Tick;
  readonly actor: Actor;
  readonly action: LogisticsAction;
  readonly location: Location;
  readonly item: Item;
};
