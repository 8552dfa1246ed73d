/**
 * Derived display values for todos: tracked time, due-date status, subtask progress.
 */

import type { Subtask, SubtaskStats } from '../types/todo.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DUE_SOON_DAYS = 3;

export const DueDateStatus = {
  Overdue: 'overdue',
  DueSoon: 'due-soon',
  OnTrack: 'on-track',
} as const;

export type DueDateStatus = (typeof DueDateStatus)[keyof typeof DueDateStatus];

/** 45 → "45m", 120 → "2h", 150 → "2h 30m" */
export function formatTimeSpent(minutes: number): string {
  if (minutes < 60) return `${minutes}m`;

  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`;
}

export function formatTimeTracking(minutes: number): string {
  return minutes === 0 ? 'No time tracked' : formatTimeSpent(minutes);
}

/**
 * Overdue when due is in the past, due soon when fewer than four whole days remain,
 * on track otherwise. Null when there is no due date or it does not parse.
 */
export function getDueDateStatus(dueDate: string | null, now: Date = new Date()): DueDateStatus | null {
  if (!dueDate) return null;
  const due = Date.parse(dueDate);
  if (Number.isNaN(due)) return null;

  const diff = due - now.getTime();
  if (diff < 0) return DueDateStatus.Overdue;
  if (Math.floor(diff / DAY_MS) <= DUE_SOON_DAYS) return DueDateStatus.DueSoon;
  return DueDateStatus.OnTrack;
}

/** "Oct 05, 2026" in local time; the raw value when it does not parse */
export function formatDueDateLabel(dueDate: string): string {
  const due = new Date(dueDate);
  if (Number.isNaN(due.getTime())) return dueDate;
  return due.toLocaleDateString('en-US', { month: 'short', day: '2-digit', year: 'numeric' });
}

/** Round half away from zero to one decimal: 6.25 → 6.3, -6.25 → -6.3 */
export function roundToTenth(value: number): number {
  return (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;
}

export function getSubtaskStats(subtasks: ReadonlyArray<Pick<Subtask, 'completed'>>): SubtaskStats {
  const total = subtasks.length;
  const completed = subtasks.filter(s => s.completed).length;
  const percentage = total > 0 ? roundToTenth((completed / total) * 100) : 0;
  return { total, completed, percentage };
}

/** Empty when there are no subtasks */
export function formatSubtaskProgress(stats: SubtaskStats): string {
  if (stats.total === 0) return '';
  return `${stats.completed}/${stats.total} subtasks (${stats.percentage}%)`;
}
