import { Command } from 'commander';
import type { TickboxDb } from '@tickbox/core';
import { setCompleted } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId } from '../helpers.js';

export function createCheckCommand(db: TickboxDb): Command {
  return new Command('check')
    .description('Mark todos completed')
    .argument('<ids...>', 'The id(s) of the todo(s) to check')
    .action((ids: string[]) => $try(() => {
      for (const id of ids) out.printResult(setCompleted(db, parseId(id), true));
    }));
}

export function createUncheckCommand(db: TickboxDb): Command {
  return new Command('uncheck')
    .description('Mark todos active again')
    .argument('<ids...>', 'The id(s) of the todo(s) to uncheck')
    .action((ids: string[]) => $try(() => {
      for (const id of ids) out.printResult(setCompleted(db, parseId(id), false));
    }));
}
