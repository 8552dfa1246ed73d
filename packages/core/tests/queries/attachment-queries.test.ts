import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TickboxDb } from '../../src/db.js';
import {
  createAttachmentRecord,
  deleteAttachmentRecord,
  getAttachmentById,
  getAttachments,
} from '../../src/queries/attachment-queries.js';
import { createTodo } from '../../src/queries/todo-queries.js';
import { minutesAfter, unwrap } from '../fixtures.js';

const T0 = new Date('2026-10-18T09:00:00Z');

let db: TickboxDb;
let todoId: number;

beforeEach(() => {
  db = createTestDb();
  todoId = unwrap(createTodo(db, { task: 'Taxes' })).id;
});

function attach(fileName: string, now: Date) {
  return unwrap(createAttachmentRecord(db, {
    todoId,
    fileName,
    filePath: `${todoId}/${fileName}`,
    fileSize: 100,
    mimeType: 'application/pdf',
  }, now));
}

describe('attachment records', () => {
  it('lists newest first', () => {
    attach('w2.pdf', T0);
    attach('receipt.pdf', minutesAfter(T0, 1));
    expect(getAttachments(db, todoId).map(a => a.fileName)).toEqual(['receipt.pdf', 'w2.pdf']);
  });

  it('looks up and deletes by id', () => {
    const attachment = attach('w2.pdf', T0);
    expect(getAttachmentById(db, attachment.id)?.filePath).toBe(`${todoId}/w2.pdf`);
    expect(deleteAttachmentRecord(db, attachment.id)).toEqual({ type: 'success', message: `Deleted attachment ${attachment.id}` });
    expect(getAttachmentById(db, attachment.id)).toBeNull();
  });

  it('reports a missing attachment', () => {
    expect(deleteAttachmentRecord(db, 12)).toEqual({ type: 'not-found', entity: 'attachment', id: 12 });
  });

  it('requires an existing todo', () => {
    const result = createAttachmentRecord(db, {
      todoId: 999, fileName: 'a.pdf', filePath: '999/a.pdf', fileSize: 1, mimeType: null,
    });
    expect(result.type).toBe('error');
  });
});
