import { Command } from 'commander';
import type { Priority, TickboxDb, TodoPatch } from '@tickbox/core';
import { getCategoryById, updateTodo } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseDueArg, parseId, parseOptionalId, parsePriorityArg } from '../helpers.js';

interface EditOptions {
  task?: string;
  description?: string;
  priority?: Priority;
  due?: string | null;
  category?: number | null;
}

export function createEditCommand(db: TickboxDb): Command {
  return new Command('edit')
    .description('Edit a todo')
    .argument('<id>', 'Todo id', parseId)
    .option('--task <text>', 'New task text')
    .option('--description <text>', 'New description (empty string clears it)')
    .option('--priority <level>', 'high, medium or low', parsePriorityArg)
    .option('--due <date>', "New due date, or 'none' to clear", (v: string) => parseDueArg(v))
    .option('--category <id>', "Category id, or 'none' to clear", parseOptionalId)
    .action((id: number, opts: EditOptions) => $try(() => {
      if (opts.category != null && !getCategoryById(db, opts.category)) {
        out.printResult({ type: 'not-found', entity: 'category', id: opts.category });
        return;
      }

      const patch: TodoPatch = {
        task: opts.task,
        description: opts.description,
        priority: opts.priority,
        dueDate: opts.due,
        categoryId: opts.category,
      };
      out.printResult(updateTodo(db, id, patch));
    }));
}
