import { pgTable, uuid, varchar, text, doublePrecision, integer, timestamp, index } from 'drizzle-orm/pg-core';

// Mirrors migrations/20241211000001_create_flowers_table.sql
export const flowers = pgTable(
  'flowers',
  {
    id: uuid('id').primaryKey(),
    name: varchar('name', { length: 100 }).notNull(),
    color: varchar('color', { length: 50 }).notNull(),
    description: text('description'),
    price: doublePrecision('price').notNull().default(0),
    stock: integer('stock').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  table => ({
    nameIdx: index('idx_flowers_name').on(table.name),
    colorIdx: index('idx_flowers_color').on(table.color),
    createdAtIdx: index('idx_flowers_created_at').on(table.createdAt.desc()),
  })
);
