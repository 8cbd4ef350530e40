// Wire format (feed version 1)

import type { Location, LogisticsEvent } from '../types/events.js';
import type { WireEvent } from '../types/feed.js';

/**
 * Type tag of a location as consumers see it.
 * Entity locations are tagged with the entity's type; all others with their kind.
 */
export function locationTypeTag(location: Location): string {
  return location.kind === 'entity' ? location.entityType : location.kind;
}

/**
 * Convert an event to its flat wire record.
 */
export function toWireEvent(event: LogisticsEvent): WireEvent {
  return {
    tick: event.tick,
    actor: {
      type: event.actor.kind,
      id: event.actor.id,
      name: event.actor.name,
    },
    action: event.action,
    source_or_target: {
      type: locationTypeTag(event.location),
      id: event.location.id,
      slot_name: event.location.slotName,
    },
    item: {
      name: event.item.name,
      quantity: event.item.quantity,
      quality: event.item.quality,
    },
  };
}

/**
 * Render an event as a single human-readable line, e.g.
 * `TAKE | Tick:120 | Actor:player-hand[1,alice] | Source:player-inventory [ID:1] Slot:main | Item:iron-plate | Qty:5 | Quality:normal`
 */
export function describeEvent(event: LogisticsEvent): string {
  const wire = toWireEvent(event);
  const place = `${wire.source_or_target.type} [ID:${wire.source_or_target.id}] Slot:${wire.source_or_target.slot_name}`;
  const role = event.action === 'TAKE' ? 'Source' : event.action === 'GIVE' ? 'Target' : 'Location';

  return [
    wire.action,
    `Tick:${wire.tick}`,
    `Actor:${wire.actor.type}[${wire.actor.id},${wire.actor.name}]`,
    `${role}:${place}`,
    `Item:${wire.item.name}`,
    `Qty:${wire.item.quantity}`,
    `Quality:${wire.item.quality}`,
  ].join(' | ');
}
