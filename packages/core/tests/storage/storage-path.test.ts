import { describe, it, expect } from 'vitest';
import { buildStoragePath, formatPathTimestamp, sanitizeFileName } from '../../src/storage/storage-path.js';

describe('sanitizeFileName', () => {
  it('replaces spaces and slashes with underscores', () => {
    expect(sanitizeFileName('my report/v2 final.pdf')).toBe('my_report_v2_final.pdf');
  });

  it('leaves other characters alone', () => {
    expect(sanitizeFileName('notes-2026.txt')).toBe('notes-2026.txt');
  });
});

describe('buildStoragePath', () => {
  const now = new Date(2026, 2, 5, 9, 4, 3);

  it('formats the local timestamp', () => {
    expect(formatPathTimestamp(now)).toBe('20260305_090403');
  });

  it('prefixes the todo id and timestamp', () => {
    expect(buildStoragePath(7, 'meeting notes.txt', now)).toBe('7/20260305_090403_meeting_notes.txt');
  });
});
