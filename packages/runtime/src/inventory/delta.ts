// Delta engine - signed differences between snapshots

import type {
  CompositeDelta,
  CompositeSnapshot,
  Delta,
  ItemKey,
  SlotName,
  Snapshot,
} from '@logitrace/protocol';
import { EMPTY_SNAPSHOT } from './snapshot.js';

/**
 * new - old for every key in either snapshot, omitting zero changes.
 * Keys of `old` come first in the result, in their insertion order.
 */
export function diffSnapshots(old: Snapshot, next: Snapshot): Delta {
  const delta = new Map<ItemKey, number>();

  for (const [key, oldCount] of old) {
    const change = (next.get(key) ?? 0) - oldCount;
    if (change !== 0) delta.set(key, change);
  }

  for (const [key, newCount] of next) {
    if (!old.has(key) && newCount !== 0) delta.set(key, newCount);
  }

  return delta;
}

/**
 * Per-slot diff. A slot present on one side only is diffed against an empty
 * snapshot; slots without changes are omitted.
 */
export function diffComposite(old: CompositeSnapshot, next: CompositeSnapshot): CompositeDelta {
  const deltas = new Map<SlotName, Delta>();

  for (const [slot, oldItems] of old) {
    const delta = diffSnapshots(oldItems, next.get(slot) ?? EMPTY_SNAPSHOT);
    if (!isEmptyDelta(delta)) deltas.set(slot, delta);
  }

  for (const [slot, newItems] of next) {
    if (old.has(slot)) continue;
    const delta = diffSnapshots(EMPTY_SNAPSHOT, newItems);
    if (!isEmptyDelta(delta)) deltas.set(slot, delta);
  }

  return deltas;
}

export function isEmptyDelta(delta: Delta | CompositeDelta): boolean {
  return delta.size === 0;
}

export function negateDelta(delta: Delta): Delta {
  const negated = new Map<ItemKey, number>();
  for (const [key, change] of delta) negated.set(key, -change);
  return negated;
}

/**
 * Entries of a delta whose sign matches (`1` gains, `-1` losses).
 */
export function entriesWithSign(delta: Delta, sign: 1 | -1): Array<[ItemKey, number]> {
  return [...delta].filter(([, change]) => Math.sign(change) === sign);
}
