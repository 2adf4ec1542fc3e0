import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { eq, sql } from 'drizzle-orm';
import type { Database } from './connection';
import { schemaMigrations } from './schema';
import { getPgErrorCode } from '@/errors/app-error';
import { logger } from '@/lib/logger';

// Arbitrary key shared by every instance applying migrations to one database
const MIGRATION_LOCK_KEY = 4_719_112_024;

const MIGRATION_FILE_PATTERN = /^(\d+)_(.+)\.sql$/;

export interface Migration {
  version: number;
  description: string;
  fileName: string;
  sql: string;
  checksum: string;
}

export class MigrationError extends Error {
  public readonly version: number | undefined;
  public readonly code: string | undefined;

  constructor(message: string, options: { version?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'MigrationError';
    this.version = options.version;
    this.code = getPgErrorCode(options.cause);
  }
}

/**
 * Split a SQL script into individual statements.
 *
 * Semicolons inside quoted strings, quoted identifiers and comments do not
 * terminate a statement. Statements that are empty or only comments are dropped.
 */
export const splitSqlStatements = (script: string): string[] => {
  const statements: string[] = [];
  let current = '';
  let hasCode = false;
  let i = 0;

  const flush = () => {
    if (hasCode) {
      statements.push(current.trim());
    }
    current = '';
    hasCode = false;
  };

  while (i < script.length) {
    const char = script[i];
    const next = script[i + 1];

    if (char === '-' && next === '-') {
      const end = script.indexOf('\n', i);
      const stop = end === -1 ? script.length : end;
      current += script.slice(i, stop);
      i = stop;
      continue;
    }

    if (char === '/' && next === '*') {
      const end = script.indexOf('*/', i + 2);
      const stop = end === -1 ? script.length : end + 2;
      current += script.slice(i, stop);
      i = stop;
      continue;
    }

    if (char === "'" || char === '"') {
      // A doubled quote inside the literal is an escaped quote
      let j = i + 1;
      while (j < script.length) {
        if (script[j] === char) {
          if (script[j + 1] === char) {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      const stop = Math.min(j + 1, script.length);
      current += script.slice(i, stop);
      hasCode = true;
      i = stop;
      continue;
    }

    if (char === ';') {
      flush();
      i++;
      continue;
    }

    current += char;
    if (!/\s/.test(char)) {
      hasCode = true;
    }
    i++;
  }

  flush();
  return statements;
};

const checksumOf = (contents: string) => createHash('sha256').update(contents).digest('hex');

/**
 * Read every `<version>_<description>.sql` file in a directory, ordered by version
 */
export const loadMigrations = async (dir: string): Promise<Migration[]> => {
  const entries = await readdir(dir);
  const migrations: Migration[] = [];

  for (const fileName of entries.filter(entry => entry.endsWith('.sql'))) {
    const match = MIGRATION_FILE_PATTERN.exec(fileName);
    if (!match) {
      throw new MigrationError(`Invalid migration file name: ${fileName}`);
    }

    const contents = await readFile(path.join(dir, fileName), 'utf-8');
    migrations.push({
      version: Number(match[1]),
      description: match[2].replace(/_/g, ' '),
      fileName,
      sql: contents,
      checksum: checksumOf(contents),
    });
  }

  migrations.sort((a, b) => a.version - b.version);

  for (let index = 1; index < migrations.length; index++) {
    if (migrations[index].version === migrations[index - 1].version) {
      throw new MigrationError(`Duplicate migration version ${migrations[index].version}`, {
        version: migrations[index].version,
      });
    }
  }

  return migrations;
};

type Executor = Pick<Database, 'execute'>;

const executeScript = async (executor: Executor, migration: Migration) => {
  for (const statement of splitSqlStatements(migration.sql)) {
    await executor.execute(sql.raw(statement));
  }
};

const describeFailure = (migration: Migration, error: unknown) => {
  const detail = error instanceof Error ? error.message : String(error);
  return new MigrationError(`Migration ${migration.version} (${migration.description}) failed: ${detail}`, {
    version: migration.version,
    cause: error,
  });
};

/**
 * Execute one migration in a transaction without recording it. Running a
 * migration with non-idempotent statements twice fails the second time.
 */
export const applyMigrationFile = async (db: Database, migration: Migration): Promise<void> => {
  try {
    await db.transaction(async tx => {
      await executeScript(tx, migration);
    });
  } catch (error) {
    throw describeFailure(migration, error);
  }
};

const ensureBookkeepingTable = async (db: Database) => {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version BIGINT PRIMARY KEY,
      description TEXT NOT NULL,
      checksum TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
};

/**
 * Apply every migration that has not been recorded yet, in version order.
 * Returns the versions applied by this call.
 */
export const runMigrations = async (db: Database, migrationsOrDir: Migration[] | string): Promise<number[]> => {
  const migrations =
    typeof migrationsOrDir === 'string' ? await loadMigrations(migrationsOrDir) : migrationsOrDir;

  await ensureBookkeepingTable(db);

  const applied: number[] = [];

  for (const migration of migrations) {
    const wasApplied = await db.transaction(async tx => {
      await tx.execute(sql`SELECT pg_advisory_xact_lock(${MIGRATION_LOCK_KEY})`);

      const [recorded] = await tx
        .select()
        .from(schemaMigrations)
        .where(eq(schemaMigrations.version, migration.version))
        .limit(1);

      if (recorded) {
        if (recorded.checksum !== migration.checksum) {
          throw new MigrationError(
            `Migration ${migration.version} was modified after it was applied`,
            { version: migration.version }
          );
        }
        return false;
      }

      try {
        await executeScript(tx, migration);
      } catch (error) {
        throw describeFailure(migration, error);
      }

      await tx.insert(schemaMigrations).values({
        version: migration.version,
        description: migration.description,
        checksum: migration.checksum,
      });

      return true;
    });

    if (wasApplied) {
      logger.info(`Applied migration ${migration.fileName}`, { version: migration.version });
      applied.push(migration.version);
    }
  }

  return applied;
};
