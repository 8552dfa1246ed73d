import type { TodoId } from '../types/todo.js';

/** Which todo, if any, is open for inline editing */
export interface EditorState {
  readonly editingId: TodoId | null;
}

export function createEditorState(): EditorState {
  return { editingId: null };
}

/** Opening a second todo replaces the first; only one is edited at a time */
export function startEditing(_state: EditorState, todoId: TodoId): EditorState {
  return { editingId: todoId };
}

export function stopEditing(_state: EditorState): EditorState {
  return { editingId: null };
}

export function isEditing(state: EditorState, todoId: TodoId): boolean {
  return state.editingId === todoId;
}
