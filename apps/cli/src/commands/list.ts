import { Command } from 'commander';
import type { Priority, SortMode, TickboxDb } from '@tickbox/core';
import {
  StatusFilter, filterTodosByTags, getTodos, searchTodos, sortTodos,
} from '@tickbox/core';
import * as out from '../output.js';
import {
  $try, parseId, parseIds, parsePriorityFilterArg, parseSortArg, parseStatusArg,
} from '../helpers.js';

interface ListOptions {
  status: StatusFilter;
  priority: Priority | 'all';
  category?: number;
  search?: string;
  tag?: string[];
  sort: SortMode;
}

export function createListCommand(db: TickboxDb): Command {
  return new Command('list')
    .description('List todos')
    .option('-s, --status <status>', 'all, active or completed', parseStatusArg, StatusFilter.All)
    .option('-p, --priority <level>', 'all, high, medium or low', parsePriorityFilterArg, 'all')
    .option('-c, --category <id>', 'Only todos in this category', parseId)
    .option('-q, --search <text>', 'Search task, description and tag names')
    .option('-t, --tag <ids...>', 'Only todos carrying any of these tags')
    .option('--sort <mode>', 'default, priority, due_date or created', parseSortArg, 'default')
    .action((opts: ListOptions) => $try(() => {
      // Store-side constraints first, then refinements over the fetched rows
      const fetched = getTodos(db, {
        status: opts.status,
        priority: opts.priority,
        categoryId: opts.category ?? 'all',
      });
      const searched = searchTodos(fetched, opts.search?.trim() ?? '');
      const tagged = filterTodosByTags(searched, parseIds(opts.tag ?? []));
      const todos = sortTodos(tagged, opts.sort);

      if (todos.length === 0) {
        out.info(fetched.length === 0 && opts.status === StatusFilter.All
          ? 'No todos yet... use the add command to create one'
          : 'No todos match the current filters');
        return;
      }

      const now = new Date();
      for (const todo of todos) console.log(out.formatTodoLine(todo, now));
    }));
}
