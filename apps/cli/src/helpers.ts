import { InvalidArgumentError } from 'commander';
import type { Priority, SortMode, StatusFilter, TickboxDb } from '@tickbox/core';
import {
  describeError, getAllTags, isPriority, parseDueDate,
  parsePriorityFilter, parseSortMode, parseStatusFilter,
} from '@tickbox/core';
import * as out from './output.js';

/** Error boundary for command actions: print the failure and exit non-zero */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(describeError(err));
    process.exitCode = 1;
  }
}

/** Positive integer id (commander argParser) */
export function parseId(value: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError(`'${value}' is not a valid id.`);
  }
  return id;
}

export function parseIds(values: readonly string[]): number[] {
  return values.map(parseId);
}

/** An id, or 'none' to clear the reference */
export function parseOptionalId(value: string): number | null {
  return value.trim().toLowerCase() === 'none' ? null : parseId(value);
}

export function parseMinutes(value: string): number {
  const minutes = Number(value);
  if (!/^\d+$/.test(value.trim()) || minutes <= 0) {
    throw new InvalidArgumentError('Minutes must be a positive whole number.');
  }
  return minutes;
}

export function parsePriorityArg(value: string): Priority {
  const normalized = value.trim().toLowerCase();
  if (!isPriority(normalized)) {
    throw new InvalidArgumentError(`Priority must be one of: high, medium, low.`);
  }
  return normalized;
}

/** A due date expression, or 'none' to clear it */
export function parseDueArg(value: string, now: Date = new Date()): string | null {
  if (value.trim().toLowerCase() === 'none') return null;
  const due = parseDueDate(value, now);
  if (!due) {
    throw new InvalidArgumentError(`Could not understand date '${value}'. Try today, tomorrow, +3d, friday, jan15 or 2026-03-01.`);
  }
  return due;
}

export function parseStatusArg(value: string): StatusFilter {
  const status = parseStatusFilter(value);
  if (!status) throw new InvalidArgumentError('Status must be one of: all, active, completed.');
  return status;
}

export function parsePriorityFilterArg(value: string): Priority | 'all' {
  const priority = parsePriorityFilter(value);
  if (!priority) throw new InvalidArgumentError('Priority must be one of: all, high, medium, low.');
  return priority;
}

export function parseSortArg(value: string): SortMode {
  const mode = parseSortMode(value);
  if (!mode) throw new InvalidArgumentError('Sort must be one of: default, priority, due_date, created.');
  return mode;
}

/** Tag ids from the list that do not exist */
export function findUnknownTagIds(db: TickboxDb, tagIds: readonly number[]): number[] {
  const known = new Set(getAllTags(db).map(t => t.id));
  return tagIds.filter(id => !known.has(id));
}
