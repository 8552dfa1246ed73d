import { Command } from 'commander';
import chalk from 'chalk';
import type { TickboxDb } from '@tickbox/core';
import {
  createCategory, deleteCategory, getAllCategories, updateCategory,
} from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

function listCategories(db: TickboxDb): void {
  const categories = getAllCategories(db);
  if (categories.length === 0) {
    out.info('No categories yet. Add one with: tickbox categories add <name>');
    return;
  }
  for (const c of categories) {
    console.log(`  ${chalk.dim(`(${c.id})`)} ${chalk.hex(c.color)('■')} ${c.name} ${chalk.dim(c.color)}`);
  }
}

export function createCategoriesCommand(db: TickboxDb): Command {
  const categoriesCommand = new Command('categories')
    .description('Manage categories')
    .action(() => $try(() => listCategories(db)));

  categoriesCommand.addCommand(
    new Command('list')
      .description('List categories')
      .action(() => $try(() => listCategories(db))),
  );

  categoriesCommand.addCommand(
    new Command('add')
      .description('Create a category')
      .argument('<name>', 'Category name')
      .option('--color <hex>', 'Display color as #RRGGBB')
      .action((name: string, opts: { color?: string }) => $try(() => {
        out.printResult(createCategory(db, name, opts.color));
      })),
  );

  categoriesCommand.addCommand(
    new Command('edit')
      .description('Rename or recolor a category')
      .argument('<id>', 'Category id', parseId)
      .option('--name <name>', 'New name')
      .option('--color <hex>', 'New color as #RRGGBB')
      .action((id: number, opts: { name?: string; color?: string }) => $try(() => {
        out.printResult(updateCategory(db, id, opts));
      })),
  );

  categoriesCommand.addCommand(
    new Command('delete')
      .description('Delete a category; its todos become uncategorized')
      .argument('<id>', 'Category id', parseId)
      .action((id: number) => $try(() => {
        out.printResult(deleteCategory(db, id));
      })),
  );

  return categoriesCommand;
}
