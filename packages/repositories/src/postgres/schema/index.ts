// Re-export all schema tables
export * from './logistics-events.js';
