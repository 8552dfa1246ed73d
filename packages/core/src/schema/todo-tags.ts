import { sqliteTable, integer, primaryKey, index } from 'drizzle-orm/sqlite-core';
import { todos } from './todos.js';
import { tags } from './tags.js';

export const todoTags = sqliteTable('todo_tags', {
  todoId: integer('todo_id').notNull().references(() => todos.id, { onDelete: 'cascade' }),
  tagId: integer('tag_id').notNull().references(() => tags.id, { onDelete: 'cascade' }),
}, (table) => [
  primaryKey({ columns: [table.todoId, table.tagId] }),
  index('idx_todo_tags_todo').on(table.todoId),
  index('idx_todo_tags_tag').on(table.tagId),
]);
