import type { Priority } from '../types/priority.js';
import { PriorityRank } from '../types/priority.js';

export const SortMode = {
  Default: 'default',
  Priority: 'priority',
  DueDate: 'due_date',
  Created: 'created',
} as const;

export type SortMode = (typeof SortMode)[keyof typeof SortMode];

export interface SortableTodo {
  readonly completed: boolean;
  readonly priority: Priority;
  readonly dueDate: string | null;
  readonly createdAt: string;
}

export type TodoComparator<T extends SortableTodo = SortableTodo> = (a: T, b: T) => number;

/** Missing or unparseable due dates sort as if due on this day */
const FAR_FUTURE = Date.parse('9999-12-31T00:00:00Z');

function dueTime(dueDate: string | null): number {
  if (!dueDate) return FAR_FUTURE;
  const t = Date.parse(dueDate);
  return Number.isNaN(t) ? FAR_FUTURE : t;
}

const byCompleted: TodoComparator = (a, b) => Number(a.completed) - Number(b.completed);
const byPriority: TodoComparator = (a, b) => PriorityRank[a.priority] - PriorityRank[b.priority];
const byDueDate: TodoComparator = (a, b) => dueTime(a.dueDate) - dueTime(b.dueDate);
const byCreatedDesc: TodoComparator = (a, b) => b.createdAt.localeCompare(a.createdAt);

function chain(...comparators: TodoComparator[]): TodoComparator {
  return (a, b) => {
    for (const cmp of comparators) {
      const r = cmp(a, b);
      if (r !== 0) return r;
    }
    return 0;
  };
}

const COMPARATORS: Record<SortMode, TodoComparator> = {
  // Active first, then severity (high → low), then soonest due
  [SortMode.Default]: chain(byCompleted, byPriority, byDueDate),
  [SortMode.Priority]: chain(byCompleted, byPriority),
  [SortMode.DueDate]: chain(byCompleted, byDueDate),
  [SortMode.Created]: byCreatedDesc,
};

export function getTodoComparator(mode: SortMode = SortMode.Default): TodoComparator {
  return COMPARATORS[mode];
}

/** Stable sort into a new array; the input is left untouched */
export function sortTodos<T extends SortableTodo>(todos: readonly T[], mode: SortMode = SortMode.Default): T[] {
  return [...todos].sort(getTodoComparator(mode));
}

export function parseSortMode(input: string): SortMode | null {
  switch (input.trim().toLowerCase()) {
    case 'default': return SortMode.Default;
    case 'priority': return SortMode.Priority;
    case 'due': case 'due_date': case 'due-date': return SortMode.DueDate;
    case 'created': case 'newest': return SortMode.Created;
    default: return null;
  }
}
