import type { Priority } from './priority.js';

export type TodoId = number;
export type CategoryId = number;
export type TagId = number;
export type SubtaskId = number;
export type AttachmentId = number;

export interface Todo {
  readonly id: TodoId;
  readonly task: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly priority: Priority;
  readonly dueDate: string | null; // ISO-8601 timestamp
  readonly categoryId: CategoryId | null;
  readonly timeSpentMinutes: number;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

export interface Category {
  readonly id: CategoryId;
  readonly name: string;
  readonly color: string;
  readonly createdAt: string;
}

export interface Tag {
  readonly id: TagId;
  readonly name: string;
  readonly createdAt: string;
}

export interface Subtask {
  readonly id: SubtaskId;
  readonly todoId: TodoId;
  readonly title: string;
  readonly completed: boolean;
  /** Explicit ordering key; new subtasks get max + 1 */
  readonly position: number;
  readonly createdAt: string;
}

export interface Attachment {
  readonly id: AttachmentId;
  readonly todoId: TodoId;
  readonly fileName: string;
  /** Object path inside the storage bucket */
  readonly filePath: string;
  readonly fileSize: number;
  readonly mimeType: string | null;
  readonly createdAt: string;
}

/** A todo joined with its category and tags, as returned by listing queries */
export interface TodoWithRelations extends Todo {
  readonly category: Category | null;
  readonly tags: readonly Tag[];
}

export interface NewTodo {
  task: string;
  description?: string | null;
  priority?: Priority;
  dueDate?: string | null;
  categoryId?: CategoryId | null;
}

export type TodoPatch = Partial<Pick<Todo, 'task' | 'description' | 'priority' | 'dueDate' | 'categoryId' | 'completed'>>;

export interface NewAttachment {
  todoId: TodoId;
  fileName: string;
  filePath: string;
  fileSize: number;
  mimeType: string | null;
}

export interface SubtaskStats {
  readonly total: number;
  readonly completed: number;
  /** 0–100, rounded half away from zero to one decimal */
  readonly percentage: number;
}
