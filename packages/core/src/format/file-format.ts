import type { Attachment } from '../types/todo.js';
import { getFileIcon } from '../storage/file-types.js';

const KB = 1024;
const MB = 1024 * 1024;

/** 512 → "512 B", 1536 → "1.5 KB", 2621440 → "2.5 MB" */
export function formatFileSize(bytes: number): string {
  if (bytes < KB) return `${bytes} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(1)} KB`;
  return `${(bytes / MB).toFixed(1)} MB`;
}

export function formatAttachmentLine(attachment: Pick<Attachment, 'fileName' | 'fileSize'>): string {
  return `${getFileIcon(attachment.fileName)} ${attachment.fileName} (${formatFileSize(attachment.fileSize)})`;
}
