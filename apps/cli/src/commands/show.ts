import { Command } from 'commander';
import chalk from 'chalk';
import type { TickboxDb } from '@tickbox/core';
import {
  formatAttachmentLine, getAttachments, getSubtaskStats, getSubtasks, getTodoWithRelations,
} from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

export function createShowCommand(db: TickboxDb): Command {
  return new Command('show')
    .description('Show a todo with its subtasks and attachments')
    .argument('<id>', 'Todo id', parseId)
    .action((id: number) => $try(() => {
      const todo = getTodoWithRelations(db, id);
      if (!todo) {
        out.printResult({ type: 'not-found', entity: 'todo', id });
        return;
      }

      const subtasks = getSubtasks(db, id);
      console.log(out.formatTodoLine(todo));
      console.log(`  ${out.formatTodoSummary(todo, getSubtaskStats(subtasks))}`);
      if (todo.description) console.log(`  ${chalk.dim(todo.description)}`);

      if (subtasks.length > 0) {
        console.log(chalk.bold('\nSubtasks'));
        for (const s of subtasks) {
          console.log(`  ${chalk.dim(`(${s.id})`)} ${out.formatCheckbox(s.completed)} ${s.title}`);
        }
      }

      const attachments = getAttachments(db, id);
      if (attachments.length > 0) {
        console.log(chalk.bold('\nAttachments'));
        for (const a of attachments) console.log(`  ${chalk.dim(`(${a.id})`)} ${formatAttachmentLine(a)}`);
      }
    }));
}
