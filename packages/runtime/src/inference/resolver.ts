// Source/target resolver
//
// Given that an item left or entered a player's hand, find the container it
// came from or went to by diffing the containers the engine was watching.
// This is a best-effort heuristic: two unrelated changes of the same item at
// once can be attributed to the wrong container.

import type { ItemKey, Location, PlayerHandle } from '@logitrace/protocol';
import { diffSnapshots } from '../inventory/delta.js';
import { snapshotInventory } from '../inventory/snapshot.js';
import type { ActorObservationState } from '../session/state.js';
import { entityLocation, playerInventoryLocation } from '../composer/locations.js';

/** -1: the item disappeared from a container (TAKE source); 1: it appeared (GIVE target) */
export type ExpectedSign = 1 | -1;

export type ResolvedChange = {
  location: Location;
  /** Magnitude of the observed change, always positive */
  quantity: number;
};

/**
 * Look for the container whose contents of `key` changed in the expected
 * direction. The main inventory is checked first, then each container of
 * the open entity in registration order; the first match wins and its stored
 * snapshot is replaced by the fresh one.
 *
 * @returns the matching location, or undefined when nothing tracked explains
 * the change (callers then fall back to the world location)
 */
export function resolveInventoryChange(
  player: PlayerHandle,
  state: ActorObservationState,
  key: ItemKey,
  expectedSign: ExpectedSign
): ResolvedChange | undefined {
  const freshMain = snapshotInventory(player.getMainInventory());
  const mainChange = diffSnapshots(state.mainInventory, freshMain).get(key);

  if (mainChange !== undefined && Math.sign(mainChange) === expectedSign) {
    state.mainInventory = freshMain;
    return {
      location: playerInventoryLocation(player.index),
      quantity: Math.abs(mainChange),
    };
  }

  const open = state.openContainer;
  if (!open || !open.entity.valid) return undefined;

  for (const container of open.containers) {
    if (!container.inventory.valid) continue;

    const fresh = snapshotInventory(container.inventory);
    const change = diffSnapshots(container.snapshot, fresh).get(key);

    if (change !== undefined && Math.sign(change) === expectedSign) {
      container.snapshot = fresh;
      return {
        location: entityLocation(open.entity, container.slotName),
        quantity: Math.abs(change),
      };
    }
  }

  return undefined;
}
