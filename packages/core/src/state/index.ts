export { createEditorState, startEditing, stopEditing, isEditing } from './editor-state.js';
export type { EditorState } from './editor-state.js';
