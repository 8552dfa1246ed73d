/**
 * Refinements applied client-side to an already-fetched result set.
 * Free-text search and tag selection are not pushed down to the store.
 */

import type { TagId } from '../types/todo.js';

export interface SearchableTodo {
  readonly task: string;
  readonly description: string | null;
  readonly tags?: ReadonlyArray<{ readonly name: string }>;
}

export interface TaggedTodo {
  readonly tags?: ReadonlyArray<{ readonly id: TagId }>;
}

function matchesQuery(todo: SearchableTodo, needle: string): boolean {
  if (todo.task.toLowerCase().includes(needle)) return true;
  if (todo.description && todo.description.toLowerCase().includes(needle)) return true;
  return (todo.tags ?? []).some(tag => tag.name.toLowerCase().includes(needle));
}

/**
 * Case-insensitive substring search over task text, then description, then tag names.
 * An empty query returns the input array itself.
 */
export function searchTodos<T extends SearchableTodo>(todos: T[], query: string): T[] {
  if (!query) return todos;
  const needle = query.toLowerCase();
  return todos.filter(todo => matchesQuery(todo, needle));
}

/** Keep todos carrying ANY of the selected tags. An empty selection returns the input array itself. */
export function filterTodosByTags<T extends TaggedTodo>(todos: T[], tagIds: readonly TagId[]): T[] {
  if (tagIds.length === 0) return todos;
  const selected = new Set(tagIds);
  return todos.filter(todo => (todo.tags ?? []).some(tag => selected.has(tag.id)));
}
