// Postgres-backed storage (drizzle-orm + postgres.js)
export {
  createDatabase,
  createEventArchive,
  type Database,
  type DatabaseConfig,
  type PgEventArchive,
} from './db.js';
export * as schema from './schema/index.js';
export { PgEventArchiveRepository, rowToArchivedEvent } from './repositories/index.js';
