import { Command } from 'commander';
import type { TodoStore } from '@todoline/core';
import { addTodoLine } from '@todoline/core';
import * as out from '../output.js';
import { resolveTodoPath, joinWords, today, $try } from '../helpers.js';

export function createAddCommand(store: TodoStore, defaultPath: () => string): Command {
  return new Command('add')
    .alias('a')
    .description('Add an item (supports: x, (A), dates, +project, @context)')
    .argument('<text...>', 'The todo line')
    .option('-t, --date', "Prefix today's date as the creation date")
    .action((words: string[], opts: { date?: boolean }, cmd: Command) => $try(() => {
      const path = resolveTodoPath(cmd, defaultPath);
      const result = addTodoLine(store, path, joinWords(words), opts.date ? { createdOn: today() } : {});

      switch (result.type) {
        case 'success': out.success(`Added ${result.message}`); break;
        case 'not-found': out.error(`No item ${result.itemNumber}`); break;
        case 'no-change': out.info(result.message); break;
        case 'error': out.error(result.message); break;
      }
    }));
}
