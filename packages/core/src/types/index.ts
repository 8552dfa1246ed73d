export { Priority, PriorityName, PriorityRank, PRIORITY_VALUES, DEFAULT_PRIORITY, isPriority } from './priority.js';
export { StatusFilter } from './status-filter.js';
export type {
  TodoId, CategoryId, TagId, SubtaskId, AttachmentId,
  Todo, Category, Tag, Subtask, Attachment, TodoWithRelations,
  NewTodo, TodoPatch, NewAttachment, SubtaskStats,
} from './todo.js';
export type { EntityKind, TodoResult, DataResult, Failure } from './results.js';
export { notFound, invalid, describeError, attempt, attemptAsync } from './results.js';
