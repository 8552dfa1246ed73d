/**
 * Todo CRUD against the relational store.
 * Listing is a join-fetch: each todo comes back with its category and tags.
 */

import { asc, desc, eq, inArray, sql } from 'drizzle-orm';
import type { TickboxDb } from '../db.js';
import { todos } from '../schema/todos.js';
import { categories } from '../schema/categories.js';
import { tags } from '../schema/tags.js';
import { todoTags } from '../schema/todo-tags.js';
import { DEFAULT_PRIORITY } from '../types/priority.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attempt, invalid, notFound } from '../types/results.js';
import type { NewTodo, Tag, Todo, TodoId, TodoPatch, TodoWithRelations } from '../types/todo.js';
import { buildTodoConstraints, toWhereClause, type TodoFilterCriteria } from './todo-filters.js';

const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;

/** Canonical UTC form of an ISO-8601 timestamp, or null when the text is not one */
function normalizeTimestamp(value: string): string | null {
  if (!ISO_TIMESTAMP_RE.test(value)) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/** Checks the fields and normalises the due date in place; returns the first problem */
function validateTodoFields(fields: { task?: string; dueDate?: string | null }): string | null {
  if (fields.task !== undefined && fields.task.trim().length === 0) return 'Task text is required';
  if (fields.dueDate != null) {
    const normalized = normalizeTimestamp(fields.dueDate);
    if (!normalized) return `Due date '${fields.dueDate}' is not a valid ISO-8601 timestamp`;
    fields.dueDate = normalized;
  }
  return null;
}

function trimOrNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

export function getTodoById(db: TickboxDb, todoId: TodoId): Todo | null {
  return db.select().from(todos).where(eq(todos.id, todoId)).get() ?? null;
}

/** Tags per todo id, each list ordered by tag name */
function getTagsByTodo(db: TickboxDb, todoIds: TodoId[]): Map<TodoId, Tag[]> {
  const byTodo = new Map<TodoId, Tag[]>();
  if (todoIds.length === 0) return byTodo;

  const rows = db.select({ todoId: todoTags.todoId, tag: tags })
    .from(todoTags)
    .innerJoin(tags, eq(todoTags.tagId, tags.id))
    .where(inArray(todoTags.todoId, todoIds))
    .orderBy(asc(tags.name))
    .all();

  for (const row of rows) {
    const list = byTodo.get(row.todoId);
    if (list) list.push(row.tag);
    else byTodo.set(row.todoId, [row.tag]);
  }
  return byTodo;
}

/**
 * Fetch todos with category and tags, constrained server-side by status/priority/category.
 * Ordered active first, then newest first.
 */
export function getTodos(db: TickboxDb, criteria: TodoFilterCriteria = {}): TodoWithRelations[] {
  const where = toWhereClause(buildTodoConstraints(criteria));
  const rows = db.select({ todo: todos, category: categories })
    .from(todos)
    .leftJoin(categories, eq(todos.categoryId, categories.id))
    .where(where)
    .orderBy(asc(todos.completed), desc(todos.createdAt), desc(todos.id))
    .all();

  const tagsByTodo = getTagsByTodo(db, rows.map(r => r.todo.id));
  return rows.map(({ todo, category }) => ({
    ...todo,
    category,
    tags: tagsByTodo.get(todo.id) ?? [],
  }));
}

/** A single todo with its category and tags */
export function getTodoWithRelations(db: TickboxDb, todoId: TodoId): TodoWithRelations | null {
  const row = db.select({ todo: todos, category: categories })
    .from(todos)
    .leftJoin(categories, eq(todos.categoryId, categories.id))
    .where(eq(todos.id, todoId))
    .get();
  if (!row) return null;

  return {
    ...row.todo,
    category: row.category,
    tags: getTagsByTodo(db, [todoId]).get(todoId) ?? [],
  };
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

export function createTodo(db: TickboxDb, fields: NewTodo, now = new Date()): DataResult<Todo> {
  const input: NewTodo = { ...fields };
  const problem = validateTodoFields(input);
  if (problem) return invalid(problem);

  const timestamp = now.toISOString();
  return attempt((): DataResult<Todo> => {
    const todo = db.insert(todos).values({
      task: input.task.trim(),
      description: trimOrNull(input.description),
      completed: false,
      priority: input.priority ?? DEFAULT_PRIORITY,
      dueDate: input.dueDate ?? null,
      categoryId: input.categoryId ?? null,
      timeSpentMinutes: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    }).returning().get();
    return { type: 'success', data: todo, message: `Created todo ${todo.id}` };
  });
}

export function updateTodo(db: TickboxDb, todoId: TodoId, patch: TodoPatch, now = new Date()): DataResult<Todo> {
  const changes: { -readonly [K in keyof TodoPatch]: TodoPatch[K] } = { ...patch };
  if (changes.task !== undefined) changes.task = changes.task.trim();
  if (changes.description !== undefined) changes.description = trimOrNull(changes.description);

  const provided = Object.values(changes).some(v => v !== undefined);
  if (!provided) return { type: 'no-change', message: `Nothing to update on todo ${todoId}` };

  const problem = validateTodoFields(changes);
  if (problem) return invalid(problem);
  if (!getTodoById(db, todoId)) return notFound('todo', todoId);

  return attempt((): DataResult<Todo> => {
    const todo = db.update(todos)
      .set({ ...changes, updatedAt: now.toISOString() })
      .where(eq(todos.id, todoId))
      .returning()
      .get();
    if (!todo) return notFound('todo', todoId);
    return { type: 'success', data: todo, message: `Updated todo ${todoId}` };
  });
}

export function setCompleted(db: TickboxDb, todoId: TodoId, completed: boolean, now = new Date()): TodoResult {
  const todo = getTodoById(db, todoId);
  if (!todo) return notFound('todo', todoId);
  const label = completed ? 'completed' : 'active';
  if (todo.completed === completed) return { type: 'no-change', message: `Todo ${todoId} is already ${label}` };

  return attempt((): TodoResult => {
    db.update(todos).set({ completed, updatedAt: now.toISOString() }).where(eq(todos.id, todoId)).run();
    return { type: 'success', message: `Marked todo ${todoId} ${label}` };
  });
}

/** Add minutes to a todo's tracked time; the increment happens in a single UPDATE */
export function addTimeSpent(db: TickboxDb, todoId: TodoId, minutes: number, now = new Date()): DataResult<Todo> {
  if (!Number.isInteger(minutes) || minutes <= 0) return invalid('Minutes must be a positive whole number');

  return attempt((): DataResult<Todo> => {
    const todo = db.update(todos)
      .set({
        timeSpentMinutes: sql`${todos.timeSpentMinutes} + ${minutes}`,
        updatedAt: now.toISOString(),
      })
      .where(eq(todos.id, todoId))
      .returning()
      .get();
    if (!todo) return notFound('todo', todoId);
    return { type: 'success', data: todo, message: `Added ${minutes}m to todo ${todoId}` };
  });
}

/**
 * Delete the todo row. Subtasks, attachment rows and tag links go with it via
 * ON DELETE CASCADE; stored files are NOT touched (see AttachmentManager.deleteTodo).
 */
export function deleteTodoRecord(db: TickboxDb, todoId: TodoId): TodoResult {
  return attempt((): TodoResult => {
    const { changes } = db.delete(todos).where(eq(todos.id, todoId)).run();
    if (changes === 0) return notFound('todo', todoId);
    return { type: 'success', message: `Deleted todo ${todoId}` };
  });
}
