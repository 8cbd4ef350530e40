// @logitrace/protocol
// Data model of the logistics event feed: item keys, snapshots, events,
// host handles, notifications and the wire format.

export * from './types/index.js';
export * from './feed/index.js';
