// Snapshot builder - point-in-time quantity maps of containers and entities

import type {
  CompositeSnapshot,
  EntityHandle,
  InventoryHandle,
  InventoryRole,
  ItemKey,
  SlotName,
  Snapshot,
} from '@logitrace/protocol';
import { encodeItemKey } from '../items/codec.js';
import { DEFAULT_SLOT_SPEC, type SlotSpec } from './slots.js';

/**
 * A container of an entity together with the slot name it reports under.
 */
export type EntityContainer = {
  role: InventoryRole;
  slotName: SlotName;
  inventory: InventoryHandle;
};

export const EMPTY_SNAPSHOT: Snapshot = new Map();

/**
 * Snapshot one container. Absent or invalid containers give an empty
 * snapshot. Lines for the same key are summed; empty or nameless lines
 * are skipped.
 */
export function snapshotInventory(inventory: InventoryHandle | undefined): Snapshot {
  if (!inventory || !inventory.valid) return new Map();

  const snapshot = new Map<ItemKey, number>();
  for (const line of inventory.getContents()) {
    if (!line.name || !(line.count > 0)) continue;
    const key = encodeItemKey(line.name, line.quality);
    snapshot.set(key, (snapshot.get(key) ?? 0) + line.count);
  }
  return snapshot;
}

/**
 * The valid containers of an entity in slot-spec order. A container reachable
 * through several roles is listed once, under the first role that reaches it.
 */
export function listEntityContainers(
  entity: EntityHandle | undefined,
  slotSpec: SlotSpec = DEFAULT_SLOT_SPEC
): EntityContainer[] {
  if (!entity || !entity.valid) return [];

  const seen = new Set<number>();
  const containers: EntityContainer[] = [];

  for (const { role, slotName } of slotSpec) {
    const inventory = entity.getInventory(role);
    if (!inventory || !inventory.valid) continue;
    if (seen.has(inventory.index)) continue;

    seen.add(inventory.index);
    containers.push({ role, slotName, inventory });
  }

  return containers;
}

/**
 * Snapshot every tracked container of an entity, keyed by slot name.
 * Containers that share a slot name are merged.
 */
export function snapshotEntity(
  entity: EntityHandle | undefined,
  slotSpec: SlotSpec = DEFAULT_SLOT_SPEC
): CompositeSnapshot {
  const composite = new Map<SlotName, Snapshot>();

  for (const { slotName, inventory } of listEntityContainers(entity, slotSpec)) {
    const snapshot = snapshotInventory(inventory);
    const existing = composite.get(slotName);
    composite.set(slotName, existing ? mergeSnapshots(existing, snapshot) : snapshot);
  }

  return composite;
}

/**
 * Sum two snapshots key-wise.
 */
export function mergeSnapshots(a: Snapshot, b: Snapshot): Snapshot {
  const merged = new Map(a);
  for (const [key, count] of b) {
    merged.set(key, (merged.get(key) ?? 0) + count);
  }
  return merged;
}

/**
 * Total item count of a snapshot.
 */
export function snapshotTotal(snapshot: Snapshot): number {
  let total = 0;
  for (const count of snapshot.values()) total += count;
  return total;
}
