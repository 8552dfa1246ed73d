/**
 * Translates user-selected filter criteria into constraints the store applies.
 * "All" (or an absent criterion) never produces a constraint.
 */

import { and, eq, type SQL } from 'drizzle-orm';
import { todos } from '../schema/todos.js';
import type { Priority } from '../types/priority.js';
import { isPriority } from '../types/priority.js';
import { StatusFilter } from '../types/status-filter.js';
import type { CategoryId } from '../types/todo.js';

export interface TodoFilterCriteria {
  status?: StatusFilter;
  priority?: Priority | 'all';
  categoryId?: CategoryId | 'all';
}

export interface TodoConstraints {
  completed?: boolean;
  priority?: Priority;
  categoryId?: CategoryId;
}

export function buildTodoConstraints(criteria: TodoFilterCriteria = {}): TodoConstraints {
  const constraints: TodoConstraints = {};

  switch (criteria.status) {
    case StatusFilter.Active: constraints.completed = false; break;
    case StatusFilter.Completed: constraints.completed = true; break;
    default: break;
  }

  if (criteria.priority != null && criteria.priority !== 'all') {
    constraints.priority = criteria.priority;
  }
  if (criteria.categoryId != null && criteria.categoryId !== 'all') {
    constraints.categoryId = criteria.categoryId;
  }

  return constraints;
}

/** Drizzle WHERE condition for a constraint set, or undefined when unconstrained */
export function toWhereClause(constraints: TodoConstraints): SQL | undefined {
  const conditions: SQL[] = [];
  if (constraints.completed !== undefined) conditions.push(eq(todos.completed, constraints.completed));
  if (constraints.priority !== undefined) conditions.push(eq(todos.priority, constraints.priority));
  if (constraints.categoryId !== undefined) conditions.push(eq(todos.categoryId, constraints.categoryId));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export function parseStatusFilter(input: string): StatusFilter | null {
  switch (input.trim().toLowerCase()) {
    case 'all': return StatusFilter.All;
    case 'active': case 'open': case 'pending': return StatusFilter.Active;
    case 'completed': case 'done': return StatusFilter.Completed;
    default: return null;
  }
}

export function parsePriorityFilter(input: string): Priority | 'all' | null {
  const normalized = input.trim().toLowerCase();
  if (normalized === 'all') return 'all';
  return isPriority(normalized) ? normalized : null;
}
