import { Command } from 'commander';
import type { TodoStore, TodoFilter } from '@todoline/core';
import { loadTodos, findTodos, isPriority } from '@todoline/core';
import * as out from '../output.js';
import { resolveTodoPath, parsePriorityArg, $try } from '../helpers.js';

interface ListOptions {
  done?: boolean;
  pending?: boolean;
  priority?: string;
}

export function createListCommand(store: TodoStore, defaultPath: () => string): Command {
  return new Command('list')
    .alias('ls')
    .description('List items, optionally filtered by +project, @context or text')
    .argument('[terms...]', 'Filter terms; every term must match')
    .option('-d, --done', 'Show only completed items')
    .option('-p, --pending', 'Show only open items')
    .option('--priority <letter>', 'Show only items with this priority')
    .action((terms: string[], opts: ListOptions, cmd: Command) => $try(() => {
      if (opts.done && opts.pending) {
        out.error('Cannot use both --done and --pending at the same time');
        return;
      }

      const priority = opts.priority === undefined ? undefined : parsePriorityArg(opts.priority);
      if (priority !== undefined && !isPriority(priority)) {
        out.error(`Invalid priority: ${opts.priority}`);
        return;
      }

      const filter: TodoFilter = {
        terms,
        ...(opts.done ? { completed: true } : opts.pending ? { completed: false } : {}),
        ...(priority !== undefined ? { priority } : {}),
      };

      const list = loadTodos(store, resolveTodoPath(cmd, defaultPath));
      if (list.items.length === 0) {
        out.info('No items yet... use the add command to create one');
        return;
      }

      const shown = findTodos(list, filter);
      const width = String(list.items.length).length;
      for (const { number, todo } of shown) {
        out.info(out.formatTodo(todo, number, width));
      }
      out.info('--');
      out.info(`${shown.length} of ${list.items.length} items shown`);
    }));
}
