// Item-key codec
//
// Keys are interned: every (name, quality) pair maps to exactly one frozen
// object, so keys compare by identity and work directly as Map keys. No
// string encoding is involved, so item names may contain any character.
//
// The intern table is process-wide: it is shared by every session, survives
// a session reset and keeps one entry per item type and quality ever seen.
// Hosts report a bounded set of item types, so it is never pruned.

import { DEFAULT_QUALITY, type ItemKey, type ItemStackHandle } from '@logitrace/protocol';

const interned = new Map<string, Map<string, ItemKey>>();

/**
 * Canonical quality token: absent or empty becomes "normal".
 */
export function normalizeQuality(quality: string | null | undefined): string {
  return quality ? quality : DEFAULT_QUALITY;
}

/**
 * Get the key for an item type and quality.
 */
export function encodeItemKey(name: string, quality?: string | null): ItemKey {
  const q = normalizeQuality(quality);

  let byQuality = interned.get(name);
  if (!byQuality) {
    byQuality = new Map();
    interned.set(name, byQuality);
  }

  let key = byQuality.get(q);
  if (!key) {
    key = Object.freeze({ name, quality: q });
    byQuality.set(q, key);
  }
  return key;
}

/**
 * Inverse of `encodeItemKey`.
 */
export function decodeItemKey(key: ItemKey): [name: string, quality: string] {
  return [key.name, key.quality];
}

/**
 * Key of a readable stack, or undefined for an empty one.
 */
export function itemKeyFromStack(stack: ItemStackHandle | undefined): ItemKey | undefined {
  if (!stack || !stack.validForRead) return undefined;
  return encodeItemKey(stack.name, stack.quality);
}
