#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import { FileTodoStore, getDefaultTodoPath } from '@todoline/core';

import { createListCommand } from './commands/list.js';
import { createAddCommand } from './commands/add.js';
import { createDoCommand, createUndoCommand } from './commands/check.js';
import { createPriorityCommand } from './commands/priority.js';
import { createReplaceCommand, createAppendCommand, createPrependCommand } from './commands/edit.js';
import { createProjectsCommand, createContextsCommand } from './commands/tags.js';

// Initialize storage
const store = new FileTodoStore();
const defaultPath = () => getDefaultTodoPath();

// Build the CLI program
const program = new Command()
  .name('todoline')
  .description('Read and edit todo.txt files')
  .version('0.1.0')
  .option('-f, --file <path>', 'The todo.txt file to use (default: $TODO_FILE or the data directory)');

// Register commands
program.addCommand(createListCommand(store, defaultPath), { isDefault: true });
program.addCommand(createAddCommand(store, defaultPath));
program.addCommand(createDoCommand(store, defaultPath));
program.addCommand(createUndoCommand(store, defaultPath));
program.addCommand(createPriorityCommand(store, defaultPath));
program.addCommand(createReplaceCommand(store, defaultPath));
program.addCommand(createAppendCommand(store, defaultPath));
program.addCommand(createPrependCommand(store, defaultPath));
program.addCommand(createProjectsCommand(store, defaultPath));
program.addCommand(createContextsCommand(store, defaultPath));

program.parse();
