/**
 * Coordinates the bucket and the attachment rows so the two stay in step.
 * Order matters: uploads go to the bucket before the row is written, and
 * removals delete the object before the row.
 */

import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { TickboxDb } from '../db.js';
import { createLogger } from '../logger.js';
import {
  createAttachmentRecord,
  deleteAttachmentRecord,
  getAttachmentById,
  getAttachments,
} from '../queries/attachment-queries.js';
import { deleteTodoRecord, getTodoById } from '../queries/todo-queries.js';
import { guessMimeType } from '../storage/file-types.js';
import { MAX_FILE_SIZE_BYTES, validateFileUpload } from '../storage/file-validation.js';
import type { StorageBucket } from '../storage/storage-bucket.js';
import { buildStoragePath } from '../storage/storage-path.js';
import { DEFAULT_SIGNED_URL_TTL_SECONDS } from '../config.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attemptAsync, invalid, notFound } from '../types/results.js';
import type { Attachment, AttachmentId, TodoId } from '../types/todo.js';

const log = createLogger('ATTACHMENTS');

export interface AttachmentManagerOptions {
  maxFileSizeBytes?: number;
  signedUrlTtlSeconds?: number;
  /** Clock used for storage paths and row timestamps */
  now?: () => Date;
}

export class AttachmentManager {
  private db: TickboxDb;
  private bucket: StorageBucket;
  private maxFileSizeBytes: number;
  private signedUrlTtlSeconds: number;
  private now: () => Date;

  constructor(db: TickboxDb, bucket: StorageBucket, options: AttachmentManagerOptions = {}) {
    this.db = db;
    this.bucket = bucket;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES;
    this.signedUrlTtlSeconds = options.signedUrlTtlSeconds ?? DEFAULT_SIGNED_URL_TTL_SECONDS;
    this.now = options.now ?? (() => new Date());
  }

  /** Validate, store the bytes, then record the attachment. Nothing is retried. */
  async upload(todoId: TodoId, bytes: Uint8Array, fileName: string, contentType?: string): Promise<DataResult<Attachment>> {
    const validation = validateFileUpload(bytes.byteLength, fileName, this.maxFileSizeBytes);
    if (!validation.valid) return invalid(validation.reason);
    if (!getTodoById(this.db, todoId)) return notFound('todo', todoId);

    const now = this.now();
    const mimeType = contentType ?? guessMimeType(fileName);
    const path = buildStoragePath(todoId, fileName, now);

    const stored = await this.bucket.upload(path, bytes, mimeType);
    if (stored.type !== 'success') return stored;

    const record = createAttachmentRecord(this.db, {
      todoId,
      fileName,
      filePath: stored.data,
      fileSize: bytes.byteLength,
      mimeType,
    }, now);
    // An orphaned object is left behind when the insert fails
    if (record.type !== 'success') log(`record insert failed after upload of ${path}`);
    return record;
  }

  /** Upload a file from disk. Its size is checked before any of it is read. */
  async uploadFile(todoId: TodoId, filePath: string, contentType?: string): Promise<DataResult<Attachment>> {
    const fileName = basename(filePath);
    return attemptAsync(async (): Promise<DataResult<Attachment>> => {
      const { size } = await stat(filePath);
      const validation = validateFileUpload(size, fileName, this.maxFileSizeBytes);
      if (!validation.valid) return invalid(validation.reason);
      return this.upload(todoId, await readFile(filePath), fileName, contentType);
    });
  }

  async getDownloadUrl(attachmentId: AttachmentId, ttlSeconds: number = this.signedUrlTtlSeconds): Promise<DataResult<string>> {
    const attachment = getAttachmentById(this.db, attachmentId);
    if (!attachment) return notFound('attachment', attachmentId);
    return this.bucket.createSignedUrl(attachment.filePath, ttlSeconds);
  }

  /** Object first; if that fails the row stays so the object can still be found */
  async remove(attachmentId: AttachmentId): Promise<TodoResult> {
    const attachment = getAttachmentById(this.db, attachmentId);
    if (!attachment) return notFound('attachment', attachmentId);

    const removed = await this.bucket.remove(attachment.filePath);
    if (removed.type !== 'success') {
      return { type: 'error', message: `Failed to remove '${attachment.fileName}' from storage: ${describeFailure(removed)}` };
    }

    const deleted = deleteAttachmentRecord(this.db, attachmentId);
    if (deleted.type === 'success') return { type: 'success', message: `Removed attachment '${attachment.fileName}'` };
    return deleted;
  }

  /**
   * Delete every stored file of the todo, then the todo row. Subtasks, attachment
   * rows and tag links follow through the foreign-key cascade. The first storage
   * failure stops the deletion.
   */
  async deleteTodo(todoId: TodoId): Promise<TodoResult> {
    if (!getTodoById(this.db, todoId)) return notFound('todo', todoId);

    const attachments = getAttachments(this.db, todoId);
    for (const attachment of attachments) {
      const removed = await this.bucket.remove(attachment.filePath);
      if (removed.type !== 'success') {
        return { type: 'error', message: `Failed to remove '${attachment.fileName}' from storage: ${describeFailure(removed)}` };
      }
    }
    log(`removed ${attachments.length} stored file(s) of todo ${todoId}`);

    return deleteTodoRecord(this.db, todoId);
  }
}

function describeFailure(result: Exclude<TodoResult, { type: 'success' }>): string {
  switch (result.type) {
    case 'not-found': return `${result.entity} ${result.id} not found`;
    case 'invalid': return result.reason;
    case 'no-change':
    case 'error': return result.message;
  }
}
