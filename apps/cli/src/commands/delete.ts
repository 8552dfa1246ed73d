import { Command } from 'commander';
import type { AttachmentManager } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

export function createDeleteCommand(attachments: AttachmentManager): Command {
  return new Command('delete')
    .description('Delete a todo with its subtasks, tags and stored files')
    .argument('<id>', 'Todo id', parseId)
    .action((id: number) => $try(async () => {
      out.printResult(await attachments.deleteTodo(id));
    }));
}
