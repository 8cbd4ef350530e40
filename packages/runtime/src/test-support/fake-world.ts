// In-process stand-ins for the simulation host's live objects.

import type {
  EntityHandle,
  InventoryHandle,
  InventoryRole,
  ItemCount,
  ItemStackHandle,
  PlayerHandle,
  Position,
  RobotHandle,
} from '@logitrace/protocol';

export class FakeInventory implements InventoryHandle {
  valid = true;
  private lines: ItemCount[];

  constructor(
    readonly index: number,
    lines: ItemCount[] = []
  ) {
    this.lines = lines.map((l) => ({ ...l }));
  }

  getContents(): ItemCount[] {
    return this.lines.map((l) => ({ ...l }));
  }

  /** Replace the raw content lines (duplicates allowed) */
  setLines(lines: ItemCount[]): this {
    this.lines = lines.map((l) => ({ ...l }));
    return this;
  }

  /** Set the total count of one item, collapsing it to a single line */
  set(name: string, count: number, quality?: string): this {
    this.lines = this.lines.filter((l) => !(l.name === name && (l.quality ?? 'normal') === (quality ?? 'normal')));
    if (count > 0) {
      this.lines.push({ name, count, quality });
    }
    return this;
  }

  add(name: string, count: number, quality?: string): this {
    return this.set(name, this.count(name, quality) + count, quality);
  }

  remove(name: string, count: number, quality?: string): this {
    return this.set(name, Math.max(0, this.count(name, quality) - count), quality);
  }

  count(name: string, quality?: string): number {
    return this.lines
      .filter((l) => l.name === name && (l.quality ?? 'normal') === (quality ?? 'normal'))
      .reduce((sum, l) => sum + l.count, 0);
  }
}

export type FakeEntityOptions = {
  type: string;
  name?: string;
  unitNumber?: number;
  position?: Position;
  inventories?: Partial<Record<InventoryRole, FakeInventory>>;
  stack?: ItemStackHandle;
};

export class FakeEntity implements EntityHandle {
  valid = true;
  readonly type: string;
  readonly name: string;
  readonly unitNumber?: number;
  readonly position: Position;
  readonly stack?: ItemStackHandle;
  readonly inventories: Partial<Record<InventoryRole, FakeInventory>>;

  constructor(options: FakeEntityOptions) {
    this.type = options.type;
    this.name = options.name ?? options.type;
    this.unitNumber = options.unitNumber;
    this.position = options.position ?? { x: 0, y: 0 };
    this.stack = options.stack;
    this.inventories = options.inventories ?? {};
  }

  getInventory(role: InventoryRole): FakeInventory | undefined {
    return this.inventories[role];
  }

  destroy(): void {
    this.valid = false;
  }
}

export class FakePlayer implements PlayerHandle {
  cursorStack?: ItemStackHandle;
  readonly mainInventory: FakeInventory;

  constructor(
    readonly index: number,
    readonly name: string,
    mainInventory: FakeInventory = new FakeInventory(1)
  ) {
    this.mainInventory = mainInventory;
  }

  getMainInventory(): FakeInventory {
    return this.mainInventory;
  }

  hold(name: string, count: number, quality?: string): this {
    this.cursorStack = fakeStack(name, count, quality);
    return this;
  }

  emptyHand(): this {
    this.cursorStack = undefined;
    return this;
  }
}

export function fakeStack(name: string, count: number, quality?: string): ItemStackHandle {
  return { validForRead: true, name, count, quality };
}

export function fakeRobot(unitNumber?: number, name?: string): RobotHandle {
  return { valid: true, unitNumber, name };
}

/**
 * A placed container entity with a single chest inventory.
 */
export function fakeChest(unitNumber: number, lines: ItemCount[] = []): FakeEntity {
  return new FakeEntity({
    type: 'container',
    name: 'wooden-chest',
    unitNumber,
    inventories: { chest: new FakeInventory(1, lines) },
  });
}

/**
 * An assembling machine with input, output and module inventories.
 */
export function fakeAssembler(unitNumber: number): FakeEntity {
  return new FakeEntity({
    type: 'assembling-machine',
    name: 'assembling-machine-2',
    unitNumber,
    inventories: {
      assembling_machine_input: new FakeInventory(2),
      assembling_machine_output: new FakeInventory(3),
      assembling_machine_modules: new FakeInventory(4),
    },
  });
}

/**
 * An item lying on the ground.
 */
export function fakeItemOnGround(
  stack: ItemStackHandle,
  unitNumber?: number,
  position: Position = { x: 0, y: 0 }
): FakeEntity {
  return new FakeEntity({ type: 'item-entity', name: 'item-on-ground', unitNumber, position, stack });
}
