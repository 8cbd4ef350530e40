// @logitrace/repositories
// Storage contracts for the logistics event feed and their implementations.
//
// - EventLogRepository: the synchronous, per-session, append-only log
// - EventArchiveRepository: asynchronous long-term storage across sessions
//
// Code against the interfaces; pick the in-memory or Postgres
// implementation at the edge.

export * from './interfaces/index.js';
export * from './in-memory/index.js';
export * as postgres from './postgres/index.js';
