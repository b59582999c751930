import { Command } from 'commander';
import type { TodoStore } from '@todoline/core';
import { loadTodos, countTags } from '@todoline/core';
import * as out from '../output.js';
import { resolveTodoPath, $try } from '../helpers.js';

function createTagCommand(kind: 'projects' | 'contexts', store: TodoStore, defaultPath: () => string): Command {
  const sigil = kind === 'projects' ? '+' : '@';
  return new Command(kind)
    .description(`List ${kind} (${sigil}tags) with the number of items using each`)
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const tags = countTags(loadTodos(store, resolveTodoPath(cmd, defaultPath)), kind);
      if (tags.length === 0) {
        out.info(`No ${kind} found`);
        return;
      }
      for (const tag of tags) out.info(out.formatTagCount(tag, sigil));
    }));
}

export function createProjectsCommand(store: TodoStore, defaultPath: () => string): Command {
  return createTagCommand('projects', store, defaultPath);
}

export function createContextsCommand(store: TodoStore, defaultPath: () => string): Command {
  return createTagCommand('contexts', store, defaultPath);
}
