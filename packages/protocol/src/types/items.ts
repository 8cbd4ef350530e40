// Item types - keys, snapshots and deltas

import type { SlotName } from './common.js';

/**
 * An (item type, quality) pair.
 *
 * Keys are interned by the runtime codec: two keys with the same name and
 * quality are the same object, so a key can be used directly as a Map key.
 * Never construct one by hand; use `encodeItemKey`.
 */
export type ItemKey = {
  readonly name: string;
  readonly quality: string;
};

/**
 * Quality token used when the host reports none.
 */
export const DEFAULT_QUALITY = 'normal';

/**
 * Point-in-time contents of one container: item key -> count.
 * An empty map is a valid snapshot (empty or missing container).
 */
export type Snapshot = ReadonlyMap<ItemKey, number>;

/**
 * All tracked inventory roles of one entity at an instant.
 */
export type CompositeSnapshot = ReadonlyMap<SlotName, Snapshot>;

/**
 * Signed per-key change between two snapshots (new - old).
 * Keys with zero change are never present.
 */
export type Delta = ReadonlyMap<ItemKey, number>;

/**
 * Per-slot deltas. Slots without changes are never present.
 */
export type CompositeDelta = ReadonlyMap<SlotName, Delta>;

/**
 * An item moved by an event.
 */
export type Item = {
  readonly name: string;
  /** Always a positive integer */
  readonly quantity: number;
  readonly quality: string;
};
