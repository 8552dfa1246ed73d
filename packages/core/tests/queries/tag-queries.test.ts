import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TickboxDb } from '../../src/db.js';
import {
  assignTagsToTodo,
  createTag,
  deleteTag,
  getAllTags,
  getTagByName,
  getTodoTags,
} from '../../src/queries/tag-queries.js';
import { createTodo } from '../../src/queries/todo-queries.js';
import { unwrap } from '../fixtures.js';

let db: TickboxDb;

beforeEach(() => {
  db = createTestDb();
});

function tagId(name: string): number {
  const tag = getTagByName(db, name);
  if (!tag) throw new Error(`missing tag ${name}`);
  return tag.id;
}

describe('createTag', () => {
  it('adds a tag in name order', () => {
    unwrap(createTag(db, 'blocked'));
    expect(getAllTags(db).map(t => t.name)).toEqual(['blocked', 'important', 'long-term', 'quick', 'urgent']);
  });

  it('rejects blanks and duplicates', () => {
    expect(createTag(db, ' ')).toEqual({ type: 'invalid', reason: 'Tag name is required' });
    expect(createTag(db, 'urgent')).toEqual({ type: 'error', message: "Tag 'urgent' already exists" });
  });
});

describe('assignTagsToTodo', () => {
  it('replaces the whole set', () => {
    const todo = unwrap(createTodo(db, { task: 'x' }));
    assignTagsToTodo(db, todo.id, [tagId('urgent'), tagId('quick')]);
    expect(assignTagsToTodo(db, todo.id, [tagId('important')])).toEqual({
      type: 'success',
      message: `Assigned 1 tag(s) to todo ${todo.id}`,
    });
    expect(getTodoTags(db, todo.id).map(t => t.name)).toEqual(['important']);
  });

  it('ignores repeated ids', () => {
    const todo = unwrap(createTodo(db, { task: 'x' }));
    assignTagsToTodo(db, todo.id, [tagId('quick'), tagId('quick')]);
    expect(getTodoTags(db, todo.id)).toHaveLength(1);
  });

  it('clears with an empty list', () => {
    const todo = unwrap(createTodo(db, { task: 'x' }));
    assignTagsToTodo(db, todo.id, [tagId('quick')]);
    expect(assignTagsToTodo(db, todo.id, []).type).toBe('success');
    expect(getTodoTags(db, todo.id)).toEqual([]);
  });

  it('leaves the set untouched when an id is unknown', () => {
    const todo = unwrap(createTodo(db, { task: 'x' }));
    assignTagsToTodo(db, todo.id, [tagId('quick')]);
    expect(assignTagsToTodo(db, todo.id, [tagId('urgent'), 998, 999])).toEqual({
      type: 'invalid',
      reason: 'Unknown tag id(s): 998, 999',
    });
    expect(getTodoTags(db, todo.id).map(t => t.name)).toEqual(['quick']);
  });

  it('reports a missing todo', () => {
    expect(assignTagsToTodo(db, 50, [])).toEqual({ type: 'not-found', entity: 'todo', id: 50 });
  });
});

describe('deleteTag', () => {
  it('removes the tag from todos', () => {
    const todo = unwrap(createTodo(db, { task: 'x' }));
    const quick = tagId('quick');
    assignTagsToTodo(db, todo.id, [quick]);
    expect(deleteTag(db, quick)).toEqual({ type: 'success', message: `Deleted tag ${quick}` });
    expect(getTodoTags(db, todo.id)).toEqual([]);
  });

  it('reports a missing tag', () => {
    expect(deleteTag(db, 999)).toEqual({ type: 'not-found', entity: 'tag', id: 999 });
  });
});
