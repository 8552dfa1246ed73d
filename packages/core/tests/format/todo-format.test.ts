import { describe, it, expect } from 'vitest';
import {
  DueDateStatus,
  formatTimeSpent,
  formatTimeTracking,
  getDueDateStatus,
  formatDueDateLabel,
  roundToTenth,
  getSubtaskStats,
  formatSubtaskProgress,
} from '../../src/format/todo-format.js';

describe('formatTimeSpent', () => {
  it('shows minutes only under an hour', () => {
    expect(formatTimeSpent(0)).toBe('0m');
    expect(formatTimeSpent(45)).toBe('45m');
    expect(formatTimeSpent(59)).toBe('59m');
  });

  it('shows hours from 60 minutes on', () => {
    expect(formatTimeSpent(60)).toBe('1h');
    expect(formatTimeSpent(150)).toBe('2h 30m');
  });

  it('never appends 0m to whole hours', () => {
    expect(formatTimeSpent(120)).toBe('2h');
  });
});

describe('formatTimeTracking', () => {
  it('says so when nothing is tracked', () => {
    expect(formatTimeTracking(0)).toBe('No time tracked');
  });

  it('falls through to formatTimeSpent otherwise', () => {
    expect(formatTimeTracking(75)).toBe('1h 15m');
  });
});

describe('getDueDateStatus', () => {
  const now = new Date('2026-10-18T12:00:00Z');

  it('returns null without a due date', () => {
    expect(getDueDateStatus(null, now)).toBeNull();
  });

  it('returns null for an unparseable date', () => {
    expect(getDueDateStatus('someday', now)).toBeNull();
  });

  it('flags past dates as overdue', () => {
    expect(getDueDateStatus('2026-10-18T11:59:00Z', now)).toBe(DueDateStatus.Overdue);
  });

  it('is due soon up to three whole days out', () => {
    expect(getDueDateStatus('2026-10-18T12:00:00Z', now)).toBe(DueDateStatus.DueSoon);
    expect(getDueDateStatus('2026-10-21T12:00:00Z', now)).toBe(DueDateStatus.DueSoon);
    expect(getDueDateStatus('2026-10-22T11:00:00Z', now)).toBe(DueDateStatus.DueSoon);
  });

  it('is on track from four whole days out', () => {
    expect(getDueDateStatus('2026-10-22T12:00:00Z', now)).toBe(DueDateStatus.OnTrack);
  });
});

describe('formatDueDateLabel', () => {
  it('renders month, day and year', () => {
    expect(formatDueDateLabel('2026-10-05T12:00:00')).toBe('Oct 05, 2026');
  });

  it('returns the raw value when it does not parse', () => {
    expect(formatDueDateLabel('next week')).toBe('next week');
  });
});

describe('subtask progress', () => {
  it('rounds to one decimal', () => {
    expect(roundToTenth(66.666)).toBe(66.7);
    expect(roundToTenth(33.333)).toBe(33.3);
    expect(roundToTenth(0.25)).toBe(0.3);
  });

  it('counts completed subtasks', () => {
    const stats = getSubtaskStats([{ completed: true }, { completed: false }, { completed: true }]);
    expect(stats).toEqual({ total: 3, completed: 2, percentage: 66.7 });
  });

  it('reports 0% with no subtasks', () => {
    expect(getSubtaskStats([])).toEqual({ total: 0, completed: 0, percentage: 0 });
  });

  it('formats progress text', () => {
    expect(formatSubtaskProgress({ total: 3, completed: 2, percentage: 66.7 })).toBe('2/3 subtasks (66.7%)');
    expect(formatSubtaskProgress({ total: 4, completed: 4, percentage: 100 })).toBe('4/4 subtasks (100%)');
  });

  it('is empty with no subtasks', () => {
    expect(formatSubtaskProgress({ total: 0, completed: 0, percentage: 0 })).toBe('');
  });
});
