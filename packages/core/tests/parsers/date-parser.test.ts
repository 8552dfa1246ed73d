import { describe, it, expect } from 'vitest';
import { parseDueDate } from '../../src/parsers/date-parser.js';

// Sunday, 18 October 2026, mid-afternoon local time
const now = new Date(2026, 9, 18, 15, 30);

/** ISO timestamp of local midnight; month is 1-based */
function midnight(year: number, month: number, day: number): string {
  return new Date(year, month - 1, day).toISOString();
}

describe('parseDueDate', () => {
  it('handles keywords', () => {
    expect(parseDueDate('today', now)).toBe(midnight(2026, 10, 18));
    expect(parseDueDate('Tomorrow', now)).toBe(midnight(2026, 10, 19));
    expect(parseDueDate('yesterday', now)).toBe(midnight(2026, 10, 17));
  });

  it('handles relative offsets', () => {
    expect(parseDueDate('+3d', now)).toBe(midnight(2026, 10, 21));
    expect(parseDueDate('+2w', now)).toBe(midnight(2026, 11, 1));
    expect(parseDueDate('+1m', now)).toBe(midnight(2026, 11, 18));
  });

  it('picks the next matching weekday', () => {
    expect(parseDueDate('friday', now)).toBe(midnight(2026, 10, 23));
    expect(parseDueDate('mon', now)).toBe(midnight(2026, 10, 19));
    expect(parseDueDate('sunday', now)).toBe(midnight(2026, 10, 25));
  });

  it('rolls month-day into next year once passed', () => {
    expect(parseDueDate('dec25', now)).toBe(midnight(2026, 12, 25));
    expect(parseDueDate('jan15', now)).toBe(midnight(2027, 1, 15));
  });

  it('accepts yyyy-MM-dd', () => {
    expect(parseDueDate('2026-11-02', now)).toBe(midnight(2026, 11, 2));
  });

  it('normalises full timestamps', () => {
    expect(parseDueDate('2026-10-20T15:30:00Z', now)).toBe('2026-10-20T15:30:00.000Z');
  });

  it('rejects impossible dates', () => {
    expect(parseDueDate('feb30', now)).toBeNull();
    expect(parseDueDate('2026-02-30', now)).toBeNull();
    expect(parseDueDate('2026-13-45T00:00', now)).toBeNull();
  });

  it('returns null for empty or unknown input', () => {
    expect(parseDueDate('', now)).toBeNull();
    expect(parseDueDate('  ', now)).toBeNull();
    expect(parseDueDate(undefined, now)).toBeNull();
    expect(parseDueDate('whenever', now)).toBeNull();
  });

  it('does not modify the reference date', () => {
    const ref = new Date(2026, 9, 18, 15, 30);
    parseDueDate('tomorrow', ref);
    expect(ref.getHours()).toBe(15);
  });
});
