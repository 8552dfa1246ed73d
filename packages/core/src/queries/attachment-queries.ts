/**
 * Attachment metadata rows. The stored objects themselves are handled by
 * AttachmentManager; nothing here touches the bucket.
 */

import { desc, eq } from 'drizzle-orm';
import type { TickboxDb } from '../db.js';
import { attachments } from '../schema/attachments.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attempt, notFound } from '../types/results.js';
import type { Attachment, AttachmentId, NewAttachment, TodoId } from '../types/todo.js';

/** Attachments of a todo, newest first */
export function getAttachments(db: TickboxDb, todoId: TodoId): Attachment[] {
  return db.select().from(attachments)
    .where(eq(attachments.todoId, todoId))
    .orderBy(desc(attachments.createdAt), desc(attachments.id))
    .all();
}

export function getAttachmentById(db: TickboxDb, attachmentId: AttachmentId): Attachment | null {
  return db.select().from(attachments).where(eq(attachments.id, attachmentId)).get() ?? null;
}

export function createAttachmentRecord(db: TickboxDb, input: NewAttachment, now = new Date()): DataResult<Attachment> {
  return attempt((): DataResult<Attachment> => {
    const attachment = db.insert(attachments)
      .values({ ...input, createdAt: now.toISOString() })
      .returning()
      .get();
    return { type: 'success', data: attachment, message: `Attached '${attachment.fileName}' to todo ${input.todoId}` };
  });
}

export function deleteAttachmentRecord(db: TickboxDb, attachmentId: AttachmentId): TodoResult {
  return attempt((): TodoResult => {
    const { changes } = db.delete(attachments).where(eq(attachments.id, attachmentId)).run();
    if (changes === 0) return notFound('attachment', attachmentId);
    return { type: 'success', message: `Deleted attachment ${attachmentId}` };
  });
}
