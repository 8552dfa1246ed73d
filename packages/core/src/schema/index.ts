export { categories } from './categories.js';
export { tags } from './tags.js';
export { todos } from './todos.js';
export { todoTags } from './todo-tags.js';
export { subtasks } from './subtasks.js';
export { attachments } from './attachments.js';
