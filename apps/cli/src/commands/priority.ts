import { Command } from 'commander';
import type { TodoStore } from '@todoline/core';
import { setTodoPriority } from '@todoline/core';
import * as out from '../output.js';
import { resolveTodoPath, parseItemNumber, parsePriorityArg, $try } from '../helpers.js';

export function createPriorityCommand(store: TodoStore, defaultPath: () => string): Command {
  return new Command('pri')
    .alias('p')
    .description("Set or clear an item's priority")
    .argument('<number>', 'Item number')
    .argument('<priority>', "A letter A-Z, or 'clear'")
    .action((itemNumber: string, level: string, _opts: unknown, cmd: Command) => $try(() => {
      const path = resolveTodoPath(cmd, defaultPath);
      out.printResult(setTodoPriority(store, path, parseItemNumber(itemNumber), parsePriorityArg(level)));
    }));
}
