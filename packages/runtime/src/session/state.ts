// Per-actor and per-entity observation state owned by a session

import type {
  CompositeSnapshot,
  EntityHandle,
  EntityKey,
  ItemKey,
  Snapshot,
} from '@logitrace/protocol';
import type { EntityContainer } from '../inventory/snapshot.js';

/**
 * One container of an opened entity with the contents last seen in it.
 */
export type TrackedContainer = EntityContainer & {
  snapshot: Snapshot;
};

export type OpenContainer = {
  entity: EntityHandle;
  /** In registration order */
  containers: TrackedContainer[];
};

/**
 * What the engine last knew about one player.
 */
export type ActorObservationState = {
  hand?: { key: ItemKey; count: number };
  mainInventory: Snapshot;
  openContainer?: OpenContainer;
};

/**
 * Lazily created per-player state, never removed within a session.
 */
export class ActorStateStore {
  private states = new Map<number, ActorObservationState>();

  get(playerIndex: number): ActorObservationState {
    let state = this.states.get(playerIndex);
    if (!state) {
      state = { mainInventory: new Map() };
      this.states.set(playerIndex, state);
    }
    return state;
  }

  has(playerIndex: number): boolean {
    return this.states.has(playerIndex);
  }

  get size(): number {
    return this.states.size;
  }

  clear(): void {
    this.states.clear();
  }
}

/**
 * Composite snapshots of entities robots work on, keyed by entity key.
 * Shared by deconstruction tracking and the monitoring watchlist so each
 * change is counted once.
 */
export class EntitySnapshotStore {
  private snapshots = new Map<EntityKey, CompositeSnapshot>();

  get(key: EntityKey): CompositeSnapshot | undefined {
    return this.snapshots.get(key);
  }

  set(key: EntityKey, snapshot: CompositeSnapshot): void {
    this.snapshots.set(key, snapshot);
  }

  delete(key: EntityKey): boolean {
    return this.snapshots.delete(key);
  }

  get size(): number {
    return this.snapshots.size;
  }

  clear(): void {
    this.snapshots.clear();
  }
}

/**
 * Stable identity of an entity: its unit number, or its position when it
 * has none.
 */
export function entityKeyOf(entity: EntityHandle): EntityKey {
  return entity.unitNumber ?? `${entity.position.x}_${entity.position.y}`;
}
