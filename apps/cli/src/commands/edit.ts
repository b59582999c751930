import { Command } from 'commander';
import type { TodoStore, TaskResult } from '@todoline/core';
import { replaceTodoText, appendTodoText, prependTodoText } from '@todoline/core';
import * as out from '../output.js';
import { resolveTodoPath, parseItemNumber, joinWords, $try } from '../helpers.js';

type TextEdit = (store: TodoStore, path: string, itemNumber: number, text: string) => TaskResult;

function createTextCommand(
  name: string,
  description: string,
  edit: TextEdit,
  store: TodoStore,
  defaultPath: () => string,
): Command {
  return new Command(name)
    .description(description)
    .argument('<number>', 'Item number')
    .argument('<text...>', 'Task text')
    .action((itemNumber: string, words: string[], _opts: unknown, cmd: Command) => $try(() => {
      const path = resolveTodoPath(cmd, defaultPath);
      out.printResult(edit(store, path, parseItemNumber(itemNumber), joinWords(words)));
    }));
}

export function createReplaceCommand(store: TodoStore, defaultPath: () => string): Command {
  return createTextCommand('replace', "Replace an item's task text", replaceTodoText, store, defaultPath);
}

export function createAppendCommand(store: TodoStore, defaultPath: () => string): Command {
  return createTextCommand('append', "Add text to the end of an item's task", appendTodoText, store, defaultPath);
}

export function createPrependCommand(store: TodoStore, defaultPath: () => string): Command {
  return createTextCommand('prepend', "Add text to the start of an item's task", prependTodoText, store, defaultPath);
}
