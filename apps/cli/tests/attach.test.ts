import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, truncateSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import chalk from 'chalk';
import { AttachmentManager, LocalBucket, createTestDb, createTodo, getAttachments, type TickboxDb } from '@tickbox/core';
import { createAttachCommand } from '../src/commands/attach.js';

let tmpDir: string;
let db: TickboxDb;
let manager: AttachmentManager;
let todoId: number;

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'tickbox-attach-cli-test-'));
  db = createTestDb();
  manager = new AttachmentManager(db, new LocalBucket(tmpDir, 'todo-attachments', 'test-secret'));
  const created = createTodo(db, { task: 'Archive photos' });
  if (created.type !== 'success') throw new Error('todo not created');
  todoId = created.data.id;
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('attach', () => {
  it('rejects a file over the size limit before reading it', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const file = join(tmpDir, 'big.zip');
    writeFileSync(file, '');
    truncateSync(file, 3 * 1024 * 1024 * 1024);

    await createAttachCommand(manager).parseAsync([String(todoId), file], { from: 'user' });

    expect(errors).toHaveBeenCalledWith('File size (3072.0 MB) exceeds maximum (10.0 MB)');
    expect(process.exitCode).toBe(1);
    expect(getAttachments(db, todoId)).toEqual([]);
  });

  it('attaches a file within the limit', async () => {
    const logs = vi.spyOn(console, 'log').mockImplementation(() => {});
    const file = join(tmpDir, 'list.txt');
    writeFileSync(file, 'film, lens');

    await createAttachCommand(manager).parseAsync([String(todoId), file], { from: 'user' });

    expect(getAttachments(db, todoId)).toHaveLength(1);
    expect(logs).toHaveBeenCalledTimes(1);
  });
});
