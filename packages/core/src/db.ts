import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { createLogger } from './logger.js';

export type TickboxDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

const log = createLogger('DB');

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    color TEXT NOT NULL DEFAULT '#6366F1',
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tags (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS todos (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task TEXT NOT NULL,
    description TEXT,
    completed INTEGER NOT NULL DEFAULT 0,
    priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('low', 'medium', 'high')),
    due_date TEXT,
    category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
    time_spent_minutes INTEGER NOT NULL DEFAULT 0 CHECK (time_spent_minutes >= 0),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_todos_category ON todos(category_id);
CREATE INDEX IF NOT EXISTS idx_todos_due_date ON todos(due_date);
CREATE INDEX IF NOT EXISTS idx_todos_priority ON todos(priority);
CREATE INDEX IF NOT EXISTS idx_todos_completed ON todos(completed);

CREATE TABLE IF NOT EXISTS todo_tags (
    todo_id INTEGER NOT NULL REFERENCES todos(id) ON DELETE CASCADE,
    tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
    PRIMARY KEY (todo_id, tag_id)
);

CREATE INDEX IF NOT EXISTS idx_todo_tags_todo ON todo_tags(todo_id);
CREATE INDEX IF NOT EXISTS idx_todo_tags_tag ON todo_tags(tag_id);

CREATE TABLE IF NOT EXISTS subtasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    todo_id INTEGER NOT NULL REFERENCES todos(id) ON DELETE CASCADE,
    title TEXT NOT NULL,
    completed INTEGER NOT NULL DEFAULT 0,
    position INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_subtasks_todo ON subtasks(todo_id);

CREATE TABLE IF NOT EXISTS attachments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    todo_id INTEGER NOT NULL REFERENCES todos(id) ON DELETE CASCADE,
    file_name TEXT NOT NULL,
    file_path TEXT NOT NULL,
    file_size INTEGER NOT NULL,
    mime_type TEXT,
    created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_attachments_todo ON attachments(todo_id);
`;

export const DEFAULT_CATEGORIES: ReadonlyArray<{ name: string; color: string }> = [
  { name: 'Work', color: '#3B82F6' },
  { name: 'Personal', color: '#10B981' },
  { name: 'Shopping', color: '#F59E0B' },
  { name: 'Health', color: '#EF4444' },
];

export const DEFAULT_TAGS: readonly string[] = ['urgent', 'important', 'quick', 'long-term'];

/** Insert the starter categories and tags; existing names are left alone */
export function seedDefaults(raw: Database.Database, now = new Date()): void {
  const createdAt = now.toISOString();
  const insertCategory = raw.prepare('INSERT OR IGNORE INTO categories (name, color, created_at) VALUES (?, ?, ?)');
  const insertTag = raw.prepare('INSERT OR IGNORE INTO tags (name, created_at) VALUES (?, ?)');

  const run = raw.transaction(() => {
    for (const c of DEFAULT_CATEGORIES) insertCategory.run(c.name, c.color, createdAt);
    for (const t of DEFAULT_TAGS) insertTag.run(t, createdAt);
  });
  run();
}

/**
 * Create a Drizzle database connection with proper pragmas.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string): TickboxDb {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // All statements use IF NOT EXISTS / INSERT OR IGNORE
  sqlite.exec(CREATE_SCHEMA_SQL);
  seedDefaults(sqlite);
  log(`opened ${path}`);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema and defaults applied. For tests. */
export function createTestDb(): TickboxDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for transactions and pragmas.
 */
export function getRawDb(db: TickboxDb): Database.Database {
  return db.$client;
}

export function closeDb(db: TickboxDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
