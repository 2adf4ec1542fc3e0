import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import pg from 'pg';
import * as schema from './schema';
import { logger } from '@/lib/logger';

export type Schema = typeof schema;

/**
 * Any Drizzle PostgreSQL database over this schema, whatever the driver
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>;

export interface DatabaseConnection {
  db: Database;
  close: () => Promise<void>;
}

export interface ConnectionOptions {
  databaseUrl: string;
  maxConnections: number;
}

/**
 * Open a node-postgres pool and verify it can reach the server
 */
export const connectDatabase = async (options: ConnectionOptions): Promise<DatabaseConnection> => {
  const pool = new pg.Pool({
    connectionString: options.databaseUrl,
    max: options.maxConnections,
  });

  pool.on('error', error => {
    logger.error('Unexpected database pool error', error);
  });

  try {
    const client = await pool.connect();
    client.release();
  } catch (error) {
    await pool.end();
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to connect to database: ${detail}`, { cause: error });
  }

  const db = drizzle(pool, { schema });

  return {
    db,
    close: () => pool.end(),
  };
};
