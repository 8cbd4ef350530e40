import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';
import { PgEventArchiveRepository } from './repositories/index.js';

export type DatabaseConfig = {
  connectionString: string;
  /** Pool size; archive writes are batched, so a few connections suffice */
  maxConnections?: number;
};

// postgres.js connects lazily, so nothing is opened until the first query.
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 4,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

export type PgEventArchive = {
  archive: PgEventArchiveRepository;
  /** Drain the pool. The archive is unusable afterwards. */
  close(): Promise<void>;
};

/**
 * Open the Postgres event archive.
 *
 * ```ts
 * const { archive, close } = createEventArchive({
 *   connectionString: process.env.DATABASE_URL,
 * });
 * const forwarder = createArchiveForwarder(archive, { sessionId: session.getEventId() });
 * ```
 */
export function createEventArchive(config: DatabaseConfig): PgEventArchive {
  const { db, client } = createDatabase(config);

  return {
    archive: new PgEventArchiveRepository(db),
    close: () => client.end(),
  };
}
