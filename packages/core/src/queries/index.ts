// Filter construction and client-side refinement
export {
  buildTodoConstraints,
  toWhereClause,
  parseStatusFilter,
  parsePriorityFilter,
} from './todo-filters.js';
export type { TodoFilterCriteria, TodoConstraints } from './todo-filters.js';
export { searchTodos, filterTodosByTags } from './todo-refine.js';
export type { SearchableTodo, TaggedTodo } from './todo-refine.js';
export { SortMode, getTodoComparator, sortTodos, parseSortMode } from './todo-sort.js';
export type { SortableTodo, TodoComparator } from './todo-sort.js';

// Todo queries
export {
  getTodoById,
  getTodos,
  getTodoWithRelations,
  createTodo,
  updateTodo,
  setCompleted,
  addTimeSpent,
  deleteTodoRecord,
} from './todo-queries.js';

// Category queries
export {
  isValidColor,
  getAllCategories,
  getCategoryById,
  getCategoryByName,
  createCategory,
  updateCategory,
  deleteCategory,
} from './category-queries.js';

// Tag queries
export {
  getAllTags,
  getTagByName,
  createTag,
  deleteTag,
  getTodoTags,
  assignTagsToTodo,
} from './tag-queries.js';

// Subtask queries
export {
  getSubtasks,
  getSubtaskById,
  createSubtask,
  updateSubtask,
  deleteSubtask,
  getSubtaskCompletion,
} from './subtask-queries.js';

// Attachment queries
export {
  getAttachments,
  getAttachmentById,
  createAttachmentRecord,
  deleteAttachmentRecord,
} from './attachment-queries.js';
