import { Command } from 'commander';
import type { TickboxDb } from '@tickbox/core';
import { createSubtask, deleteSubtask, updateSubtask } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

export function createSubtaskCommand(db: TickboxDb): Command {
  const subtaskCommand = new Command('subtask')
    .description('Manage the subtasks of a todo');

  subtaskCommand.addCommand(
    new Command('add')
      .description('Add a subtask at the end of the list')
      .argument('<todoId>', 'Todo id', parseId)
      .argument('<title>', 'Subtask title')
      .action((todoId: number, title: string) => $try(() => {
        out.printResult(createSubtask(db, todoId, title));
      })),
  );

  subtaskCommand.addCommand(
    new Command('check')
      .description('Mark a subtask done')
      .argument('<id>', 'Subtask id', parseId)
      .action((id: number) => $try(() => {
        out.printResult(updateSubtask(db, id, { completed: true }));
      })),
  );

  subtaskCommand.addCommand(
    new Command('uncheck')
      .description('Mark a subtask open')
      .argument('<id>', 'Subtask id', parseId)
      .action((id: number) => $try(() => {
        out.printResult(updateSubtask(db, id, { completed: false }));
      })),
  );

  subtaskCommand.addCommand(
    new Command('rename')
      .description('Rename a subtask')
      .argument('<id>', 'Subtask id', parseId)
      .argument('<title>', 'New title')
      .action((id: number, title: string) => $try(() => {
        out.printResult(updateSubtask(db, id, { title }));
      })),
  );

  subtaskCommand.addCommand(
    new Command('delete')
      .description('Delete a subtask')
      .argument('<id>', 'Subtask id', parseId)
      .action((id: number) => $try(() => {
        out.printResult(deleteSubtask(db, id));
      })),
  );

  return subtaskCommand;
}
