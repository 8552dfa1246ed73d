import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { todos } from './todos.js';

export const attachments = sqliteTable('attachments', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  todoId: integer('todo_id').notNull().references(() => todos.id, { onDelete: 'cascade' }),
  fileName: text('file_name').notNull(),
  /** Object path in the storage bucket: {todoId}/{timestamp}_{name} */
  filePath: text('file_path').notNull(),
  fileSize: integer('file_size').notNull(),
  mimeType: text('mime_type'),
  createdAt: text('created_at').notNull(),
}, (table) => [
  index('idx_attachments_todo').on(table.todoId),
]);
