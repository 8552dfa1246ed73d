import { Command } from 'commander';
import chalk from 'chalk';
import type { AttachmentManager, TickboxDb } from '@tickbox/core';
import { formatAttachmentLine, getAttachments, getTodoById } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

export function createAttachCommand(attachments: AttachmentManager): Command {
  return new Command('attach')
    .description('Upload a file and attach it to a todo')
    .argument('<todoId>', 'Todo id', parseId)
    .argument('<file>', 'Path of the file to upload')
    .option('--type <mime>', 'Content type (guessed from the extension by default)')
    .action((todoId: number, file: string, opts: { type?: string }) => $try(async () => {
      const result = await attachments.uploadFile(todoId, file, opts.type);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }
      out.success(`Attached ${formatAttachmentLine(result.data)} to todo ${todoId} (id ${result.data.id})`);
    }));
}

export function createAttachmentsCommand(db: TickboxDb): Command {
  return new Command('attachments')
    .description('List the attachments of a todo')
    .argument('<todoId>', 'Todo id', parseId)
    .action((todoId: number) => $try(() => {
      if (!getTodoById(db, todoId)) {
        out.printResult({ type: 'not-found', entity: 'todo', id: todoId });
        return;
      }
      const list = getAttachments(db, todoId);
      if (list.length === 0) {
        out.info(`Todo ${todoId} has no attachments`);
        return;
      }
      for (const a of list) console.log(`  ${chalk.dim(`(${a.id})`)} ${formatAttachmentLine(a)}`);
    }));
}

export function createUrlCommand(attachments: AttachmentManager): Command {
  return new Command('url')
    .description('Print a time-limited download link for an attachment')
    .argument('<attachmentId>', 'Attachment id', parseId)
    .option('--ttl <seconds>', 'Link lifetime in seconds', parseId)
    .action((attachmentId: number, opts: { ttl?: number }) => $try(async () => {
      const result = await attachments.getDownloadUrl(attachmentId, opts.ttl);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }
      console.log(result.data);
    }));
}

export function createDetachCommand(attachments: AttachmentManager): Command {
  return new Command('detach')
    .description('Remove an attachment and its stored file')
    .argument('<attachmentId>', 'Attachment id', parseId)
    .action((attachmentId: number) => $try(async () => {
      out.printResult(await attachments.remove(attachmentId));
    }));
}
