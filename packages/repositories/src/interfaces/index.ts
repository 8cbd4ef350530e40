// Repository interfaces
// These define the contracts for data access, independent of the storage.

export type { EventLogRepository } from './event-log-repository.js';

export type {
  EventArchiveRepository,
  ArchivedEvent,
  ArchivedEventFilter,
} from './event-archive-repository.js';

export { MAX_ARCHIVE_PAGE } from './event-archive-repository.js';
