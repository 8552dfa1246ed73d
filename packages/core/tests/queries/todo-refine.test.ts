import { describe, it, expect } from 'vitest';
import { filterTodosByTags, searchTodos } from '../../src/queries/todo-refine.js';

const todos = [
  { id: 1, task: 'Buy Milk', description: null, tags: [{ id: 1, name: 'quick' }] },
  { id: 2, task: 'Write report', description: 'Quarterly numbers for finance', tags: [] },
  { id: 3, task: 'Call plumber', description: null, tags: [{ id: 2, name: 'urgent' }, { id: 1, name: 'quick' }] },
  { id: 4, task: 'Renew passport', description: null },
];

describe('searchTodos', () => {
  it('returns the same array for an empty query', () => {
    expect(searchTodos(todos, '')).toBe(todos);
  });

  it('matches task text case-insensitively', () => {
    expect(searchTodos(todos, 'MILK').map(t => t.id)).toEqual([1]);
  });

  it('matches descriptions', () => {
    expect(searchTodos(todos, 'finance').map(t => t.id)).toEqual([2]);
  });

  it('matches tag names', () => {
    expect(searchTodos(todos, 'urg').map(t => t.id)).toEqual([3]);
  });

  it('keeps the input order', () => {
    expect(searchTodos(todos, 'r').map(t => t.id)).toEqual([2, 3, 4]);
  });
});

describe('filterTodosByTags', () => {
  it('returns the same array for an empty selection', () => {
    expect(filterTodosByTags(todos, [])).toBe(todos);
  });

  it('keeps todos with any selected tag', () => {
    expect(filterTodosByTags(todos, [2]).map(t => t.id)).toEqual([3]);
    expect(filterTodosByTags(todos, [1, 2]).map(t => t.id)).toEqual([1, 3]);
  });

  it('keeps a todo sharing any one tag and drops one sharing none', () => {
    const tagged = [{ id: 7, task: 'Pack bags', description: null, tags: [{ id: 1, name: 'quick' }, { id: 2, name: 'urgent' }] }];
    expect(filterTodosByTags(tagged, [2, 3]).map(t => t.id)).toEqual([7]);
    expect(filterTodosByTags(tagged, [3, 4])).toEqual([]);
  });

  it('drops todos without tags', () => {
    expect(filterTodosByTags(todos, [99])).toEqual([]);
  });
});
