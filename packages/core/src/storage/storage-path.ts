import type { TodoId } from '../types/todo.js';

/** Spaces and slashes become underscores so the name stays one path segment */
export function sanitizeFileName(fileName: string): string {
  return fileName.replace(/[ /]/g, '_');
}

/** Local time as yyyyMMdd_HHmmss */
export function formatPathTimestamp(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

/** Object path for an upload: {todoId}/{yyyyMMdd_HHmmss}_{sanitized name} */
export function buildStoragePath(todoId: TodoId, fileName: string, now: Date = new Date()): string {
  return `${todoId}/${formatPathTimestamp(now)}_${sanitizeFileName(fileName)}`;
}
