// Monitoring watchlist - polls robot-built entities for robot fills
//
// The host does not report robots inserting items (modules, fuel, ammo) into
// an entity they just built. Entities are watched after construction and
// re-snapshotted every scan interval until they stay unchanged for the
// quiescence window.

import type { CompositeSnapshot, EntityHandle, EntityKey, Tick } from '@logitrace/protocol';
import { decodeItemKey } from '../items/codec.js';
import { diffComposite, entriesWithSign } from '../inventory/delta.js';
import { snapshotEntity } from '../inventory/snapshot.js';
import type { SlotSpec } from '../inventory/slots.js';
import type { LogisticsEventEmitter } from '../events/emitter.js';
import type { Logger } from '../logging.js';
import { entityKeyOf, type EntitySnapshotStore } from '../session/state.js';
import {
  LOGISTIC_NETWORK_LOCATION,
  UNIDENTIFIED_ROBOT,
  entityLocation,
} from '../composer/locations.js';

export type WatchEntry = {
  entityKey: EntityKey;
  entity: EntityHandle;
  /** Tick of the last observed fill, or of registration */
  lastChangeTick: Tick;
};

export type WatchlistTiming = {
  scanIntervalTicks: number;
  quiescenceWindowTicks: number;
};

export type WatchlistOptions = WatchlistTiming & {
  emitter: LogisticsEventEmitter;
  /** Baselines, shared with deconstruction tracking */
  entities: EntitySnapshotStore;
  slotSpec: SlotSpec;
  logger: Logger;
};

export type ScanResult = {
  scanned: number;
  /** Number of TAKE/GIVE pairs emitted */
  fills: number;
  evicted: EntityKey[];
};

export class Watchlist {
  private entries = new Map<EntityKey, WatchEntry>();
  private timing: WatchlistTiming;

  constructor(private options: WatchlistOptions) {
    this.timing = {
      scanIntervalTicks: options.scanIntervalTicks,
      quiescenceWindowTicks: options.quiescenceWindowTicks,
    };
  }

  /**
   * Start (or restart) watching an entity. The baseline is whatever the
   * entity snapshot store holds for it; an entity without one is compared
   * against an empty composite snapshot on the first scan.
   */
  watch(entity: EntityHandle, tick: Tick): WatchEntry {
    const entityKey = entityKeyOf(entity);
    const entry: WatchEntry = { entityKey, entity, lastChangeTick: tick };
    this.entries.delete(entityKey);
    this.entries.set(entityKey, entry);
    return entry;
  }

  /**
   * Called every tick; scans on multiples of the scan interval.
   */
  onTick(tick: Tick): ScanResult | undefined {
    if (tick % this.timing.scanIntervalTicks !== 0) return undefined;
    return this.scan(tick);
  }

  scan(tick: Tick): ScanResult {
    const { emitter, entities, slotSpec, logger } = this.options;
    const result: ScanResult = { scanned: 0, fills: 0, evicted: [] };

    for (const [key, entry] of [...this.entries]) {
      const { entity } = entry;

      if (!entity.valid) {
        this.entries.delete(key);
        entities.delete(key);
        result.evicted.push(key);
        logger.debug('Watched entity no longer exists', { entityKey: key });
        continue;
      }

      result.scanned++;

      const previous: CompositeSnapshot = entities.get(key) ?? new Map();
      const current = snapshotEntity(entity, slotSpec);
      let filled = false;

      for (const [slotName, delta] of diffComposite(previous, current)) {
        for (const [itemKey, quantity] of entriesWithSign(delta, 1)) {
          const [name, quality] = decodeItemKey(itemKey);
          emitter.emitTransfer(UNIDENTIFIED_ROBOT, LOGISTIC_NETWORK_LOCATION, entityLocation(entity, slotName), {
            name,
            quantity,
            quality,
          });
          result.fills++;
          filled = true;
        }
      }

      entities.set(key, current);
      if (filled) entry.lastChangeTick = tick;

      if (tick - entry.lastChangeTick > this.timing.quiescenceWindowTicks) {
        this.entries.delete(key);
        result.evicted.push(key);
        logger.debug('Watched entity is quiescent', {
          entityKey: key,
          lastChangeTick: entry.lastChangeTick,
        });
      }
    }

    return result;
  }

  /**
   * Apply new scan timing. Existing entries keep their last change tick.
   */
  retime(timing: WatchlistTiming): void {
    this.timing = { ...timing };
  }

  get(key: EntityKey): WatchEntry | undefined {
    return this.entries.get(key);
  }

  has(key: EntityKey): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
