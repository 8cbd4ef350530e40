// Postgres repository implementations
export { PgEventArchiveRepository, rowToArchivedEvent } from './event-archive-repository.js';
