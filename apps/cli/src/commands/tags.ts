import { Command } from 'commander';
import chalk from 'chalk';
import type { TickboxDb } from '@tickbox/core';
import { assignTagsToTodo, createTag, deleteTag, getAllTags } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId, parseIds } from '../helpers.js';

function listTags(db: TickboxDb): void {
  const tags = getAllTags(db);
  if (tags.length === 0) {
    out.info('No tags yet. Add one with: tickbox tags add <name>');
    return;
  }
  for (const t of tags) console.log(`  ${chalk.dim(`(${t.id})`)} ${chalk.cyan(`#${t.name}`)}`);
}

export function createTagsCommand(db: TickboxDb): Command {
  const tagsCommand = new Command('tags')
    .description('Manage tags')
    .action(() => $try(() => listTags(db)));

  tagsCommand.addCommand(
    new Command('list')
      .description('List tags')
      .action(() => $try(() => listTags(db))),
  );

  tagsCommand.addCommand(
    new Command('add')
      .description('Create a tag')
      .argument('<name>', 'Tag name')
      .action((name: string) => $try(() => {
        out.printResult(createTag(db, name));
      })),
  );

  tagsCommand.addCommand(
    new Command('delete')
      .description('Delete a tag and remove it from every todo')
      .argument('<id>', 'Tag id', parseId)
      .action((id: number) => $try(() => {
        out.printResult(deleteTag(db, id));
      })),
  );

  tagsCommand.addCommand(
    new Command('assign')
      .description("Replace a todo's tags; no tag ids clears them")
      .argument('<todoId>', 'Todo id', parseId)
      .argument('[tagIds...]', 'Tag ids')
      .action((todoId: number, tagIds: string[]) => $try(() => {
        out.printResult(assignTagsToTodo(db, todoId, parseIds(tagIds)));
      })),
  );

  return tagsCommand;
}
