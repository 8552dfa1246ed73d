import { describe, it, expect } from 'vitest';
import { createEditorState, isEditing, startEditing, stopEditing } from '../../src/state/editor-state.js';

describe('editor state', () => {
  it('starts with nothing open', () => {
    expect(createEditorState()).toEqual({ editingId: null });
  });

  it('opens one todo at a time', () => {
    const first = startEditing(createEditorState(), 1);
    const second = startEditing(first, 2);
    expect(isEditing(second, 2)).toBe(true);
    expect(isEditing(second, 1)).toBe(false);
  });

  it('returns new objects', () => {
    const state = createEditorState();
    const editing = startEditing(state, 5);
    expect(editing).not.toBe(state);
    expect(state.editingId).toBeNull();
    expect(stopEditing(editing)).toEqual({ editingId: null });
  });
});
