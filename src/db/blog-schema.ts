import { sql } from 'drizzle-orm';
import { pgTable, serial, text, varchar, boolean, timestamp, integer, index, uniqueIndex, check } from 'drizzle-orm/pg-core';

export const POST_STATUSES = ['draft', 'published'] as const;

export const categories = pgTable('categories', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 50 }).notNull(),
  slug: varchar('slug', { length: 60 }).notNull().unique(),
  description: varchar('description', { length: 200 }),
  isDefault: boolean('is_default').default(false).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex('categories_name_lower_idx').on(sql`lower(${table.name})`),
  // at most one row may hold the default role
  uniqueIndex('categories_single_default_idx').on(table.isDefault).where(sql`${table.isDefault}`),
]);

export const posts = pgTable('posts', {
  id: serial('id').primaryKey(),
  title: varchar('title', { length: 200 }).notNull(),
  slug: varchar('slug', { length: 60 }).notNull().unique(),
  description: varchar('description', { length: 160 }),
  thumbnail: varchar('thumbnail', { length: 500 }),
  body: text('body').notNull(),
  status: text('status', { enum: POST_STATUSES }).default('draft').notNull(),
  categoryId: integer('category_id')
    .notNull()
    .references(() => categories.id, { onDelete: 'restrict' }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  publishedAt: timestamp('published_at', { withTimezone: true }),
}, (table) => [
  index('posts_status_published_at_idx').on(table.status, table.publishedAt),
  index('posts_category_status_idx').on(table.categoryId, table.status),
  check('posts_published_has_timestamp', sql`${table.status} <> 'published' OR ${table.publishedAt} IS NOT NULL`),
]);
