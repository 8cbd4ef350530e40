// Common types used across the protocol

/**
 * Simulation tick. Monotonic non-decreasing within a session.
 */
export type Tick = number;

/**
 * Name of an inventory role within a multi-inventory entity
 * (e.g. "input", "output", "modules", "fuel").
 */
export type SlotName = string;

/**
 * Identity of an entity across notifications: its unit number, or
 * "<x>_<y>" built from its position when the host assigns none.
 */
export type EntityKey = number | string;
