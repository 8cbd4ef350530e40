// Inventory roles tracked per entity and the slot names they report under.

import type { InventoryRole, SlotName } from '@logitrace/protocol';

export type SlotSpecEntry = {
  role: InventoryRole;
  slotName: SlotName;
};

/**
 * Ordered role → slot-name table. Order decides which slot name wins when
 * two roles resolve to the same container, and the registration order of
 * an opened container's slots.
 */
export type SlotSpec = readonly SlotSpecEntry[];

export const DEFAULT_SLOT_SPEC: SlotSpec = [
  { role: 'chest', slotName: 'chest' },
  { role: 'furnace_source', slotName: 'input' },
  { role: 'furnace_result', slotName: 'output' },
  { role: 'furnace_modules', slotName: 'modules' },
  { role: 'assembling_machine_input', slotName: 'input' },
  { role: 'assembling_machine_output', slotName: 'output' },
  { role: 'assembling_machine_modules', slotName: 'modules' },
  { role: 'lab_input', slotName: 'input' },
  { role: 'lab_modules', slotName: 'modules' },
  { role: 'mining_drill_modules', slotName: 'modules' },
  { role: 'rocket_silo_input', slotName: 'input' },
  { role: 'rocket_silo_output', slotName: 'output' },
  { role: 'rocket_silo_modules', slotName: 'modules' },
  { role: 'beacon_modules', slotName: 'modules' },
  { role: 'fuel', slotName: 'fuel' },
  { role: 'burnt_result', slotName: 'burnt-result' },
];

/** Slot name used when an entity exposes no tracked container */
export const FALLBACK_SLOT_NAME = 'chest';
