/**
 * Standalone migration entrypoint: applies pending SQL migrations to
 * DATABASE_URL and exits.
 */

import { loadConfig } from '@/config/app.config';
import { connectDatabase } from '@/db/connection';
import { runMigrations } from '@/db/migrator';
import { logger } from '@/lib/logger';

const migrate = async () => {
  const config = loadConfig();
  const connection = await connectDatabase({
    databaseUrl: config.databaseUrl,
    maxConnections: 1,
  });

  try {
    const applied = await runMigrations(connection.db, config.migrationsDir);
    logger.info(
      applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Database is up to date'
    );
  } finally {
    await connection.close();
  }
};

migrate()
  .then(() => logger.flush())
  .catch(async (error: unknown) => {
    logger.error('Migration failed', error instanceof Error ? error : { error });
    await logger.flush();
    process.exitCode = 1;
  });
