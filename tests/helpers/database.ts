import { fileURLToPath } from 'node:url';
import { PGlite } from '@electric-sql/pglite';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/pglite';
import type { Database } from '../../src/db/connection';
import { loadMigrations, runMigrations, splitSqlStatements } from '../../src/db/migrator';
import * as schema from '../../src/db/schema';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

export interface TestDatabase {
  db: Database;
  close: () => Promise<void>;
}

/**
 * In-process PostgreSQL with no schema applied
 */
export const createEmptyDatabase = async (): Promise<TestDatabase> => {
  const client = new PGlite();
  await client.waitReady;
  const db: Database = drizzle(client, { schema });

  return {
    db,
    close: () => client.close(),
  };
};

/**
 * In-process PostgreSQL with every migration applied
 */
export const createMigratedDatabase = async (): Promise<TestDatabase> => {
  const testDb = await createEmptyDatabase();
  await runMigrations(testDb.db, MIGRATIONS_DIR);
  return testDb;
};

/**
 * Put the flowers table back to exactly the seed rows
 */
export const reseed = async (db: Database): Promise<void> => {
  const migrations = await loadMigrations(MIGRATIONS_DIR);
  const inserts = migrations
    .flatMap(migration => splitSqlStatements(migration.sql))
    .filter(statement => /\bINSERT\s+INTO\b/i.test(statement));

  await db.transaction(async tx => {
    await tx.execute(sql`DELETE FROM flowers`);
    for (const statement of inserts) {
      await tx.execute(sql.raw(statement));
    }
  });
};
