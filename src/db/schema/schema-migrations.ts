import { pgTable, bigint, text, timestamp } from 'drizzle-orm/pg-core';

// Bookkeeping for applied SQL migrations
export const schemaMigrations = pgTable('schema_migrations', {
  version: bigint('version', { mode: 'number' }).primaryKey(),
  description: text('description').notNull(),
  checksum: text('checksum').notNull(),
  appliedAt: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});
