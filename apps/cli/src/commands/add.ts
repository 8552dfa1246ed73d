import { Command } from 'commander';
import type { Priority, TickboxDb } from '@tickbox/core';
import { assignTagsToTodo, createTodo, getCategoryById } from '@tickbox/core';
import * as out from '../output.js';
import { $try, findUnknownTagIds, parseDueArg, parseId, parseIds, parsePriorityArg } from '../helpers.js';

interface AddOptions {
  description?: string;
  priority?: Priority;
  due?: string | null;
  category?: number;
  tag?: string[];
}

export function createAddCommand(db: TickboxDb): Command {
  return new Command('add')
    .description('Add a new todo')
    .argument('<task>', 'What needs doing')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <level>', 'Priority (high, medium, low)', parsePriorityArg)
    .option('--due <date>', 'Due date (today, tomorrow, +3d, friday, jan15, 2026-03-01 or an ISO timestamp)', (v: string) => parseDueArg(v))
    .option('-c, --category <id>', 'Category id', parseId)
    .option('-t, --tag <ids...>', 'Tag ids')
    .action((task: string, opts: AddOptions) => $try(() => {
      if (opts.category !== undefined && !getCategoryById(db, opts.category)) {
        out.error(`Could not find category with id ${opts.category}`);
        process.exitCode = 1;
        return;
      }
      const tagIds = parseIds(opts.tag ?? []);
      const unknown = findUnknownTagIds(db, tagIds);
      if (unknown.length > 0) {
        out.error(`Unknown tag id(s): ${unknown.join(', ')}`);
        process.exitCode = 1;
        return;
      }

      const created = createTodo(db, {
        task,
        description: opts.description ?? null,
        priority: opts.priority,
        dueDate: opts.due ?? null,
        categoryId: opts.category ?? null,
      });
      if (created.type !== 'success') {
        out.printResult(created);
        return;
      }

      if (tagIds.length > 0 && !out.printResult(assignTagsToTodo(db, created.data.id, tagIds))) return;
      out.success(`Added todo ${created.data.id}: ${created.data.task}`);
    }));
}
