/**
 * An ordered, index-addressable list of todos with an optional backing path.
 * Every edit returns a new list; an edit at a missing index is a no-op that
 * returns the input list itself.
 */

import type { IsoDate, Todo } from '../types/todo.js';
import { NoDataError, InvalidPriorityError, IoError } from '../errors.js';
import { isPriority } from '../types/priority.js';
import {
  parseTodo, todoToString, complete, setCompleted, setPriority, clearPriority,
  setTask, appendTask, prependTask, setEndDate,
} from '../model/todo.js';
import type { LineSource, Sink } from '../storage/ports.js';

export interface TaskList {
  readonly path: string | null;
  readonly items: readonly Todo[];
}

export function createTaskList(items: Iterable<Todo> = [], path: string | null = null): TaskList {
  return { path, items: [...items] };
}

/**
 * Parse each line into a Todo, in source order. Empty lines are dropped;
 * any other parse failure propagates.
 */
export function readTaskList(lines: Iterable<string>, path: string | null = null): TaskList {
  const items: Todo[] = [];
  for (const line of lines) {
    try {
      items.push(parseTodo(line));
    } catch (err: unknown) {
      if (!(err instanceof NoDataError)) throw err;
    }
  }
  return { path, items };
}

function asIoError(err: unknown, message: string, path: string): IoError {
  return err instanceof IoError ? err : new IoError(message, path, { cause: err });
}

/** Read the list stored at `path`; source failures surface as IoError */
export function readTaskListFrom(source: LineSource, path: string): TaskList {
  let lines: string[];
  try {
    lines = source.readLines(path);
  } catch (err: unknown) {
    throw asIoError(err, `Could not read ${path}`, path);
  }
  return readTaskList(lines, path);
}

/** Join every item's line with '\n', no trailing newline */
export function serializeTaskList(list: TaskList): string {
  return list.items.map(todoToString).join('\n');
}

/**
 * Overwrite `path` (default: the list's own path) with the serialized list.
 * Sink failures are surfaced as IoError and never retried.
 */
export function writeTaskList(list: TaskList, sink: Sink, path: string | null = list.path): void {
  if (path === null) throw new IoError('Task list has no path to write to', null);

  const content = serializeTaskList(list);
  try {
    sink.overwrite(path, content);
  } catch (err: unknown) {
    throw asIoError(err, `Could not write ${path}`, path);
  }
}

export function addTodo(list: TaskList, todo: Todo): TaskList {
  return { ...list, items: [...list.items, todo] };
}

/** Replace the item at `index` with `fn(item)`; out of range returns `list` unchanged */
export function updateAt(list: TaskList, index: number, fn: (todo: Todo) => Todo): TaskList {
  if (!Number.isInteger(index) || index < 0) return list;

  const current = list.items[index];
  if (current === undefined) return list;

  const items = [...list.items];
  items[index] = fn(current);
  return { ...list, items };
}

// --- Index-scoped setters ---

/** Mark done; `completedOn` is only stamped when the item carries a creation date */
export function completeAt(list: TaskList, index: number, completedOn?: IsoDate): TaskList {
  return updateAt(list, index, todo => {
    const done = complete(todo);
    return completedOn !== undefined && todo.startDate !== null ? setEndDate(done, completedOn) : done;
  });
}

export function setCompletedAt(list: TaskList, index: number, completed: boolean): TaskList {
  return updateAt(list, index, todo => setCompleted(todo, completed));
}

/** Validates eagerly, so an invalid priority is rejected even for a missing index */
export function setPriorityAt(list: TaskList, index: number, priority: string): TaskList {
  if (!isPriority(priority)) throw new InvalidPriorityError(priority);
  return updateAt(list, index, todo => setPriority(todo, priority));
}

export function clearPriorityAt(list: TaskList, index: number): TaskList {
  return updateAt(list, index, clearPriority);
}

export function setTaskAt(list: TaskList, index: number, task: string): TaskList {
  return updateAt(list, index, todo => setTask(todo, task));
}

export function appendTaskAt(list: TaskList, index: number, text: string): TaskList {
  return updateAt(list, index, todo => appendTask(todo, text));
}

export function prependTaskAt(list: TaskList, index: number, text: string): TaskList {
  return updateAt(list, index, todo => prependTask(todo, text));
}
