// Re-export all protocol types

export * from './common.js';
export * from './items.js';
export * from './events.js';
export * from './host.js';
export * from './notifications.js';
export * from './feed.js';
