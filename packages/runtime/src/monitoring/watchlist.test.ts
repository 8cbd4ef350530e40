import { describe, it, expect } from 'vitest';
import { createInMemoryEventLog } from '@logitrace/repositories';
import { LogisticsEventEmitter } from '../events/emitter.js';
import { snapshotEntity } from '../inventory/snapshot.js';
import { DEFAULT_SLOT_SPEC } from '../inventory/slots.js';
import { createCapturingLogger } from '../logging.js';
import { EntitySnapshotStore } from '../session/state.js';
import { FakeEntity, fakeAssembler, fakeChest } from '../test-support/fake-world.js';
import { Watchlist } from './watchlist.js';

// --- Test Fixtures ---

function setup(timing = { scanIntervalTicks: 60, quiescenceWindowTicks: 120 }) {
  const log = createInMemoryEventLog();
  const logger = createCapturingLogger();
  const entities = new EntitySnapshotStore();
  let now = 0;
  const emitter = new LogisticsEventEmitter({ log, clock: () => now, logger });
  const watchlist = new Watchlist({ ...timing, emitter, entities, slotSpec: DEFAULT_SLOT_SPEC, logger });

  return {
    log,
    logger,
    entities,
    watchlist,
    /** Advance the clock and scan */
    scanAt(tick: number) {
      now = tick;
      return watchlist.scan(tick);
    },
  };
}

describe('Watchlist', () => {
  it('books a module fill as network TAKE plus entity GIVE', () => {
    const { log, entities, watchlist, scanAt } = setup();
    const assembler = fakeAssembler(9);
    entities.set(9, snapshotEntity(assembler));
    watchlist.watch(assembler, 0);

    assembler.inventories.assembling_machine_modules?.set('speed-module', 2, 'epic');
    const result = scanAt(60);

    expect(result).toEqual({ scanned: 1, fills: 1, evicted: [] });
    expect(log.readFrom(1)).toEqual([
      {
        tick: 60,
        actor: { kind: 'logistic-robot', id: 0, name: 'construction-robot' },
        action: 'TAKE',
        location: { kind: 'logistic-network', id: 0, slotName: 'storage' },
        item: { name: 'speed-module', quantity: 2, quality: 'epic' },
      },
      {
        tick: 60,
        actor: { kind: 'logistic-robot', id: 0, name: 'construction-robot' },
        action: 'GIVE',
        location: { kind: 'entity', entityType: 'assembling-machine', id: 9, slotName: 'modules' },
        item: { name: 'speed-module', quantity: 2, quality: 'epic' },
      },
    ]);
    expect(watchlist.get(9)?.lastChangeTick).toBe(60);
  });

  it('counts each fill once across scans', () => {
    const { log, entities, watchlist, scanAt } = setup();
    const assembler = fakeAssembler(9);
    entities.set(9, snapshotEntity(assembler));
    watchlist.watch(assembler, 0);

    assembler.inventories.assembling_machine_input?.set('iron-plate', 4);
    scanAt(60);
    scanAt(120);

    expect(log.size()).toBe(2);
    expect(entities.get(9)?.get('input')?.size).toBe(1);
  });

  it('compares against an empty baseline when none is stored', () => {
    const { log, watchlist, scanAt } = setup();
    const chest = fakeChest(5, [{ name: 'wood', count: 3 }]);
    watchlist.watch(chest, 0);

    scanAt(60);

    expect(log.readFrom(1).map((e) => [e.action, e.item.quantity])).toEqual([
      ['TAKE', 3],
      ['GIVE', 3],
    ]);
  });

  it('emits nothing for items leaving the entity', () => {
    const { log, entities, watchlist, scanAt } = setup();
    const chest = fakeChest(5, [{ name: 'wood', count: 3 }]);
    entities.set(5, snapshotEntity(chest));
    watchlist.watch(chest, 0);

    chest.inventories.chest?.set('wood', 1);
    const result = scanAt(60);

    expect(result.fills).toBe(0);
    expect(log.size()).toBe(0);
    expect(watchlist.get(5)?.lastChangeTick).toBe(0);
  });

  it('evicts an entry on the first scan after a full quiet window', () => {
    const { watchlist, scanAt } = setup();
    watchlist.watch(fakeChest(5), 0);

    scanAt(60);
    expect(scanAt(120).evicted).toEqual([]);
    expect(watchlist.has(5)).toBe(true);

    expect(scanAt(180).evicted).toEqual([5]);
    expect(watchlist.has(5)).toBe(false);
  });

  it('resets the timer when a fill arrives just before the window ends', () => {
    const { watchlist, scanAt } = setup();
    const chest = fakeChest(5);
    watchlist.watch(chest, 0);

    chest.inventories.chest?.set('coal', 10);
    scanAt(119);
    expect(watchlist.get(5)?.lastChangeTick).toBe(119);

    expect(scanAt(239).evicted).toEqual([]);
    expect(scanAt(240).evicted).toEqual([5]);
  });

  it('drops destroyed entities and their baselines', () => {
    const { log, logger, entities, watchlist, scanAt } = setup();
    const chest = fakeChest(5);
    entities.set(5, snapshotEntity(chest));
    watchlist.watch(chest, 0);

    chest.destroy();
    const result = scanAt(60);

    expect(result).toEqual({ scanned: 0, fills: 0, evicted: [5] });
    expect(entities.get(5)).toBeUndefined();
    expect(log.size()).toBe(0);
    expect(logger.entries.map((e) => e.message)).toEqual(['Watched entity no longer exists']);
  });

  it('scans only on multiples of the scan interval', () => {
    const { watchlist } = setup();
    watchlist.watch(fakeChest(5), 0);

    expect(watchlist.onTick(59)).toBeUndefined();
    expect(watchlist.onTick(60)?.scanned).toBe(1);
  });

  it('applies new timing to existing entries', () => {
    const { watchlist, scanAt } = setup();
    watchlist.watch(fakeChest(5), 0);

    watchlist.retime({ scanIntervalTicks: 30, quiescenceWindowTicks: 30 });

    expect(watchlist.onTick(30)?.evicted).toEqual([]);
    expect(scanAt(31).evicted).toEqual([5]);
  });

  it('keys entities without a unit number by position', () => {
    const { watchlist } = setup();
    const anonymous = new FakeEntity({ type: 'container', position: { x: 3, y: -2 } });

    expect(watchlist.watch(anonymous, 0).entityKey).toBe('3_-2');
  });
});
