import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { todos } from './todos.js';

export const subtasks = sqliteTable('subtasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  todoId: integer('todo_id').notNull().references(() => todos.id, { onDelete: 'cascade' }),
  title: text('title').notNull(),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  position: integer('position').notNull().default(0),
  createdAt: text('created_at').notNull(),
}, (table) => [
  index('idx_subtasks_todo').on(table.todoId),
]);
