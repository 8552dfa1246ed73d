import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const DEFAULT_CATEGORY_COLOR = '#6366F1';

export const categories = sqliteTable('categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  /** #RRGGBB */
  color: text('color').notNull().default(DEFAULT_CATEGORY_COLOR),
  createdAt: text('created_at').notNull(),
});
