import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';
import { categories } from './categories.js';

export const todos = sqliteTable('todos', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  task: text('task').notNull(),
  description: text('description'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  priority: text('priority').$type<Priority>().notNull().default('medium'),
  /** ISO-8601 timestamp */
  dueDate: text('due_date'),
  categoryId: integer('category_id').references(() => categories.id, { onDelete: 'set null' }),
  /** Only ever incremented */
  timeSpentMinutes: integer('time_spent_minutes').notNull().default(0),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_todos_category').on(table.categoryId),
  index('idx_todos_due_date').on(table.dueDate),
  index('idx_todos_priority').on(table.priority),
  index('idx_todos_completed').on(table.completed),
]);
