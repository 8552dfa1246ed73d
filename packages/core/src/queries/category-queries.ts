/**
 * Category management. Deleting a category leaves its todos uncategorised
 * (ON DELETE SET NULL), it never deletes them.
 */

import { asc, eq } from 'drizzle-orm';
import type { TickboxDb } from '../db.js';
import { categories, DEFAULT_CATEGORY_COLOR } from '../schema/categories.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attempt, invalid, notFound } from '../types/results.js';
import type { Category, CategoryId } from '../types/todo.js';

const COLOR_RE = /^#[0-9a-fA-F]{6}$/;

export function isValidColor(color: string): boolean {
  return COLOR_RE.test(color);
}

/** All categories ordered by name */
export function getAllCategories(db: TickboxDb): Category[] {
  return db.select().from(categories).orderBy(asc(categories.name)).all();
}

export function getCategoryById(db: TickboxDb, categoryId: CategoryId): Category | null {
  return db.select().from(categories).where(eq(categories.id, categoryId)).get() ?? null;
}

export function getCategoryByName(db: TickboxDb, name: string): Category | null {
  return db.select().from(categories).where(eq(categories.name, name)).get() ?? null;
}

export function createCategory(
  db: TickboxDb,
  name: string,
  color: string = DEFAULT_CATEGORY_COLOR,
  now = new Date(),
): DataResult<Category> {
  const trimmed = name.trim();
  if (!trimmed) return invalid('Category name is required');
  if (!isValidColor(color)) return invalid(`Color '${color}' must be a hex value like #6366F1`);
  if (getCategoryByName(db, trimmed)) return { type: 'error', message: `Category '${trimmed}' already exists` };

  return attempt((): DataResult<Category> => {
    const category = db.insert(categories)
      .values({ name: trimmed, color: color.toUpperCase(), createdAt: now.toISOString() })
      .returning()
      .get();
    return { type: 'success', data: category, message: `Created category '${category.name}'` };
  });
}

export function updateCategory(
  db: TickboxDb,
  categoryId: CategoryId,
  patch: { name?: string; color?: string },
): DataResult<Category> {
  const name = patch.name?.trim();
  if (name === undefined && patch.color === undefined) {
    return { type: 'no-change', message: `Nothing to update on category ${categoryId}` };
  }
  if (name !== undefined && !name) return invalid('Category name is required');
  if (patch.color !== undefined && !isValidColor(patch.color)) {
    return invalid(`Color '${patch.color}' must be a hex value like #6366F1`);
  }
  if (!getCategoryById(db, categoryId)) return notFound('category', categoryId);
  if (name !== undefined) {
    const clash = getCategoryByName(db, name);
    if (clash && clash.id !== categoryId) return { type: 'error', message: `Category '${name}' already exists` };
  }

  return attempt((): DataResult<Category> => {
    const category = db.update(categories)
      .set({ name, color: patch.color?.toUpperCase() })
      .where(eq(categories.id, categoryId))
      .returning()
      .get();
    if (!category) return notFound('category', categoryId);
    return { type: 'success', data: category, message: `Updated category '${category.name}'` };
  });
}

export function deleteCategory(db: TickboxDb, categoryId: CategoryId): TodoResult {
  return attempt((): TodoResult => {
    const { changes } = db.delete(categories).where(eq(categories.id, categoryId)).run();
    if (changes === 0) return notFound('category', categoryId);
    return { type: 'success', message: `Deleted category ${categoryId}` };
  });
}
