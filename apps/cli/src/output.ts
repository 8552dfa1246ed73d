import chalk from 'chalk';
import type {
  Category, DataResult, Priority, SubtaskStats, Tag, TodoResult, TodoWithRelations,
} from '@tickbox/core';
import {
  DueDateStatus, PriorityName, formatDueDateLabel, formatSubtaskProgress,
  formatTimeTracking, getDueDateStatus,
} from '@tickbox/core';

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(chalk.blue(message));
}

export function describeResult(result: TodoResult | DataResult<unknown>): string {
  switch (result.type) {
    case 'not-found': return `Could not find ${result.entity} with id ${result.id}`;
    case 'invalid': return result.reason;
    case 'success':
    case 'no-change':
    case 'error': return result.message;
  }
}

/**
 * Print a store/service result. Failures go to stderr and set a non-zero exit code.
 * Returns true on success.
 */
export function printResult(result: TodoResult | DataResult<unknown>): boolean {
  const text = describeResult(result);
  switch (result.type) {
    case 'success':
      success(text);
      return true;
    case 'no-change':
      warning(text);
      return false;
    case 'not-found':
    case 'invalid':
    case 'error':
      error(text);
      process.exitCode = 1;
      return false;
  }
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case 'high': return chalk.red('!!!');
    case 'medium': return chalk.yellow(' !!');
    case 'low': return chalk.green('  !');
  }
}

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : '[ ]';
}

/** Due-date suffix; completed todos are never flagged */
export function formatDueDate(dueDate: string | null, completed: boolean, now: Date = new Date()): string {
  if (!dueDate) return '';
  const label = formatDueDateLabel(dueDate);
  if (completed) return chalk.dim(` (due ${label})`);

  switch (getDueDateStatus(dueDate, now)) {
    case DueDateStatus.Overdue: return chalk.red(` (overdue ${label})`);
    case DueDateStatus.DueSoon: return chalk.yellow(` (due soon ${label})`);
    default: return chalk.dim(` (due ${label})`);
  }
}

export function formatTags(tags: readonly Tag[]): string {
  if (tags.length === 0) return '';
  return ' ' + tags.map(t => chalk.cyan(`#${t.name}`)).join(' ');
}

export function formatCategory(category: Category | null): string {
  if (!category) return '';
  return ' ' + chalk.hex(category.color)(`[${category.name}]`);
}

export function formatTodoLine(todo: TodoWithRelations, now: Date = new Date()): string {
  const id = chalk.dim(`(${todo.id})`);
  const task = todo.completed ? chalk.dim.strikethrough(todo.task) : chalk.bold(todo.task);
  return `${id} ${formatPriority(todo.priority)} ${formatCheckbox(todo.completed)} ${task}`
    + `${formatCategory(todo.category)}${formatDueDate(todo.dueDate, todo.completed, now)}${formatTags(todo.tags)}`;
}

/** One-line detail summary: priority | category | due | time | subtask progress */
export function formatTodoSummary(todo: TodoWithRelations, subtasks: SubtaskStats): string {
  const parts = [`Priority: ${PriorityName[todo.priority]}`];
  if (todo.category) parts.push(`Category: ${todo.category.name}`);
  if (todo.dueDate) parts.push(`Due: ${formatDueDateLabel(todo.dueDate)}`);
  parts.push(`Time: ${formatTimeTracking(todo.timeSpentMinutes)}`);
  const progress = formatSubtaskProgress(subtasks);
  if (progress) parts.push(progress);
  return parts.join(' | ');
}
