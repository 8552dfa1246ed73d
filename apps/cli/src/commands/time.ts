import { Command } from 'commander';
import type { TickboxDb } from '@tickbox/core';
import { addTimeSpent, formatTimeTracking } from '@tickbox/core';
import * as out from '../output.js';
import { $try, parseId, parseMinutes } from '../helpers.js';

export const DEFAULT_TIME_INCREMENT = 15;

export function createTimeCommand(db: TickboxDb): Command {
  return new Command('time')
    .description('Track time spent on a todo')
    .argument('<id>', 'Todo id', parseId)
    .argument('[minutes]', 'Minutes to add', parseMinutes, DEFAULT_TIME_INCREMENT)
    .action((id: number, minutes: number) => $try(() => {
      const result = addTimeSpent(db, id, minutes);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }
      out.success(`Added ${minutes}m to todo ${id} (total ${formatTimeTracking(result.data.timeSpentMinutes)})`);
    }));
}
