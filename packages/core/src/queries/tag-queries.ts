/**
 * Tags and the todo↔tag join. Deleting a tag cascades to its join rows.
 */

import { asc, eq, inArray } from 'drizzle-orm';
import type { TickboxDb } from '../db.js';
import { getRawDb } from '../db.js';
import { tags } from '../schema/tags.js';
import { todoTags } from '../schema/todo-tags.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attempt, invalid, notFound } from '../types/results.js';
import type { Tag, TagId, TodoId } from '../types/todo.js';
import { getTodoById } from './todo-queries.js';

/** All tags ordered by name */
export function getAllTags(db: TickboxDb): Tag[] {
  return db.select().from(tags).orderBy(asc(tags.name)).all();
}

export function getTagByName(db: TickboxDb, name: string): Tag | null {
  return db.select().from(tags).where(eq(tags.name, name)).get() ?? null;
}

export function createTag(db: TickboxDb, name: string, now = new Date()): DataResult<Tag> {
  const trimmed = name.trim();
  if (!trimmed) return invalid('Tag name is required');
  if (getTagByName(db, trimmed)) return { type: 'error', message: `Tag '${trimmed}' already exists` };

  return attempt((): DataResult<Tag> => {
    const tag = db.insert(tags).values({ name: trimmed, createdAt: now.toISOString() }).returning().get();
    return { type: 'success', data: tag, message: `Created tag '${tag.name}'` };
  });
}

export function deleteTag(db: TickboxDb, tagId: TagId): TodoResult {
  return attempt((): TodoResult => {
    const { changes } = db.delete(tags).where(eq(tags.id, tagId)).run();
    if (changes === 0) return notFound('tag', tagId);
    return { type: 'success', message: `Deleted tag ${tagId}` };
  });
}

/** Tags assigned to one todo, ordered by name */
export function getTodoTags(db: TickboxDb, todoId: TodoId): Tag[] {
  return db.select({ tag: tags })
    .from(todoTags)
    .innerJoin(tags, eq(todoTags.tagId, tags.id))
    .where(eq(todoTags.todoId, todoId))
    .orderBy(asc(tags.name))
    .all()
    .map(r => r.tag);
}

/** Replace a todo's tag set. Passing an empty list removes every tag. */
export function assignTagsToTodo(db: TickboxDb, todoId: TodoId, tagIds: readonly TagId[]): TodoResult {
  if (!getTodoById(db, todoId)) return notFound('todo', todoId);

  const unique = [...new Set(tagIds)];
  if (unique.length > 0) {
    const known = new Set(
      db.select({ id: tags.id }).from(tags).where(inArray(tags.id, unique)).all().map(r => r.id),
    );
    const missing = unique.filter(id => !known.has(id));
    if (missing.length > 0) return invalid(`Unknown tag id(s): ${missing.join(', ')}`);
  }

  return attempt((): TodoResult => {
    const raw = getRawDb(db);
    const run = raw.transaction(() => {
      db.delete(todoTags).where(eq(todoTags.todoId, todoId)).run();
      if (unique.length > 0) {
        db.insert(todoTags).values(unique.map(tagId => ({ todoId, tagId }))).run();
      }
    });
    run();

    return unique.length > 0
      ? { type: 'success', message: `Assigned ${unique.length} tag(s) to todo ${todoId}` }
      : { type: 'success', message: `Removed all tags from todo ${todoId}` };
  });
}
