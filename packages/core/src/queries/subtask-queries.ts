/**
 * Subtasks: an ordered checklist owned by one todo.
 */

import { asc, eq, max } from 'drizzle-orm';
import type { TickboxDb } from '../db.js';
import { subtasks } from '../schema/subtasks.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attempt, invalid, notFound } from '../types/results.js';
import type { Subtask, SubtaskId, SubtaskStats, TodoId } from '../types/todo.js';
import { getSubtaskStats } from '../format/todo-format.js';
import { getTodoById } from './todo-queries.js';

/** Subtasks of a todo in position order */
export function getSubtasks(db: TickboxDb, todoId: TodoId): Subtask[] {
  return db.select().from(subtasks)
    .where(eq(subtasks.todoId, todoId))
    .orderBy(asc(subtasks.position), asc(subtasks.id))
    .all();
}

export function getSubtaskById(db: TickboxDb, subtaskId: SubtaskId): Subtask | null {
  return db.select().from(subtasks).where(eq(subtasks.id, subtaskId)).get() ?? null;
}

/** Next free position for a todo: current max + 1, or 0 for the first subtask */
function nextPosition(db: TickboxDb, todoId: TodoId): number {
  const row = db.select({ maxPosition: max(subtasks.position) }).from(subtasks).where(eq(subtasks.todoId, todoId)).get();
  return (row?.maxPosition ?? -1) + 1;
}

export function createSubtask(
  db: TickboxDb,
  todoId: TodoId,
  title: string,
  position?: number,
  now = new Date(),
): DataResult<Subtask> {
  const trimmed = title.trim();
  if (!trimmed) return invalid('Subtask title is required');
  if (!getTodoById(db, todoId)) return notFound('todo', todoId);

  return attempt((): DataResult<Subtask> => {
    const subtask = db.insert(subtasks).values({
      todoId,
      title: trimmed,
      completed: false,
      position: position ?? nextPosition(db, todoId),
      createdAt: now.toISOString(),
    }).returning().get();
    return { type: 'success', data: subtask, message: `Added subtask ${subtask.id} to todo ${todoId}` };
  });
}

export function updateSubtask(
  db: TickboxDb,
  subtaskId: SubtaskId,
  patch: { title?: string; completed?: boolean; position?: number },
): DataResult<Subtask> {
  const title = patch.title?.trim();
  if (title === undefined && patch.completed === undefined && patch.position === undefined) {
    return { type: 'no-change', message: `Nothing to update on subtask ${subtaskId}` };
  }
  if (title !== undefined && !title) return invalid('Subtask title is required');

  const existing = getSubtaskById(db, subtaskId);
  if (!existing) return notFound('subtask', subtaskId);
  if (title === undefined && patch.position === undefined && existing.completed === patch.completed) {
    return { type: 'no-change', message: `Subtask ${subtaskId} is already ${existing.completed ? 'done' : 'open'}` };
  }

  return attempt((): DataResult<Subtask> => {
    const subtask = db.update(subtasks)
      .set({ title, completed: patch.completed, position: patch.position })
      .where(eq(subtasks.id, subtaskId))
      .returning()
      .get();
    if (!subtask) return notFound('subtask', subtaskId);
    return { type: 'success', data: subtask, message: `Updated subtask ${subtaskId}` };
  });
}

export function deleteSubtask(db: TickboxDb, subtaskId: SubtaskId): TodoResult {
  return attempt((): TodoResult => {
    const { changes } = db.delete(subtasks).where(eq(subtasks.id, subtaskId)).run();
    if (changes === 0) return notFound('subtask', subtaskId);
    return { type: 'success', message: `Deleted subtask ${subtaskId}` };
  });
}

export function getSubtaskCompletion(db: TickboxDb, todoId: TodoId): SubtaskStats {
  return getSubtaskStats(getSubtasks(db, todoId));
}
