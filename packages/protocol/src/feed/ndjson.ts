// NDJSON (Newline Delimited JSON) helpers for exporting the event log

import type { WireEvent } from '../types/feed.js';

const ACTIONS = new Set(['TAKE', 'GIVE', 'MAKE']);
const ACTOR_TYPES = new Set(['player-hand', 'logistic-robot']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural check for a version 1 wire record.
 */
export function isWireEvent(value: unknown): value is WireEvent {
  if (!isRecord(value)) return false;
  const { actor, source_or_target: place, item } = value;

  return (
    typeof value.tick === 'number' &&
    typeof value.action === 'string' &&
    ACTIONS.has(value.action) &&
    isRecord(actor) &&
    typeof actor.type === 'string' &&
    ACTOR_TYPES.has(actor.type) &&
    typeof actor.id === 'number' &&
    typeof actor.name === 'string' &&
    isRecord(place) &&
    typeof place.type === 'string' &&
    typeof place.id === 'number' &&
    typeof place.slot_name === 'string' &&
    isRecord(item) &&
    typeof item.name === 'string' &&
    typeof item.quantity === 'number' &&
    typeof item.quality === 'string'
  );
}

/**
 * Stringify wire events to NDJSON, one record per line
 */
export function stringifyEventLog(events: readonly WireEvent[]): string {
  return events.map((event) => JSON.stringify(event)).join('\n') + (events.length > 0 ? '\n' : '');
}

/**
 * Parse an NDJSON event log. Blank lines are skipped.
 *
 * @throws Error naming the 1-based line that is not valid JSON or not a wire event
 */
export function parseEventLog(content: string): WireEvent[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const results: WireEvent[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new Error(
        `Failed to parse NDJSON at line ${i + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    if (!isWireEvent(parsed)) {
      throw new Error(`Line ${i + 1} is not a logistics event record`);
    }
    results.push(parsed);
  }

  return results;
}
