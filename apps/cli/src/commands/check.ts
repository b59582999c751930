import { Command } from 'commander';
import type { TodoStore } from '@todoline/core';
import { completeTodos, reopenTodos } from '@todoline/core';
import * as out from '../output.js';
import { resolveTodoPath, parseItemNumber, today, $try } from '../helpers.js';

export function createDoCommand(store: TodoStore, defaultPath: () => string): Command {
  return new Command('do')
    .description('Mark one or more items as done')
    .argument('<numbers...>', 'Item number(s)')
    .action((numbers: string[], _opts: unknown, cmd: Command) => $try(() => {
      const path = resolveTodoPath(cmd, defaultPath);
      out.printBatchResults(completeTodos(store, path, numbers.map(parseItemNumber), today()));
    }));
}

export function createUndoCommand(store: TodoStore, defaultPath: () => string): Command {
  return new Command('undo')
    .description('Mark one or more done items as open again')
    .argument('<numbers...>', 'Item number(s)')
    .action((numbers: string[], _opts: unknown, cmd: Command) => $try(() => {
      const path = resolveTodoPath(cmd, defaultPath);
      out.printBatchResults(reopenTodos(store, path, numbers.map(parseItemNumber)));
    }));
}
