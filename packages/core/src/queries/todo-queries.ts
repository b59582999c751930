/**
 * Store-backed operations used by the CLI. Each call loads the list, applies
 * one edit, and writes it back only when something changed.
 *
 * Items are addressed by 1-based item number (their line in the saved list).
 * Blank lines are left out on load, so numbers stay the same from one call to
 * the next even after a save drops them from the file.
 */

import type { IsoDate, Todo } from '../types/todo.js';
import type { Priority } from '../types/priority.js';
import type { TaskResult, DataResult, BatchResult } from '../types/results.js';
import { InvalidPriorityError } from '../errors.js';
import type { LineSource, Sink, TodoStore } from '../storage/ports.js';
import type { TaskList } from '../list/task-list.js';
import {
  readTaskListFrom, writeTaskList, addTodo, updateAt, completeAt,
  setCompletedAt, setPriorityAt, clearPriorityAt, setTaskAt, appendTaskAt, prependTaskAt,
} from '../list/task-list.js';
import { parseTodo, setStartDate, setEndDate, todoToString, roundTrips } from '../model/todo.js';

export interface NumberedTodo {
  readonly number: number;
  readonly todo: Todo;
}

export interface TodoFilter {
  /** `+project`, `@context`, or plain text (case-insensitive substring of the line) */
  readonly terms?: readonly string[];
  readonly completed?: boolean;
  readonly priority?: Priority;
}

export interface TagCount {
  readonly name: string;
  readonly count: number;
}

/** Read the list at `path`, leaving out items that would be written as a blank line */
export function loadTodos(source: LineSource, path: string): TaskList {
  const list = readTaskListFrom(source, path);
  const items = list.items.filter(todo => todoToString(todo) !== '');
  return items.length === list.items.length ? list : { ...list, items };
}

export function saveTodos(sink: Sink, list: TaskList): void {
  writeTaskList(list, sink);
}

const LINE_BREAK_IN_TEXT_RE = /[\r\n]/;
const LINE_BREAK_ERROR = 'Task text cannot contain line breaks';

function itemAt(list: TaskList, itemNumber: number): Todo | undefined {
  return Number.isInteger(itemNumber) && itemNumber >= 1 ? list.items[itemNumber - 1] : undefined;
}

// --- Reading ---

function matchesTerm(todo: Todo, term: string): boolean {
  if (term.length > 1 && term.startsWith('+')) return todo.projects.includes(term.slice(1));
  if (term.length > 1 && term.startsWith('@')) return todo.contexts.includes(term.slice(1));
  return todoToString(todo).toLowerCase().includes(term.toLowerCase());
}

/** Items matching every part of the filter, with their item numbers */
export function findTodos(list: TaskList, filter: TodoFilter = {}): NumberedTodo[] {
  const terms = filter.terms ?? [];
  return list.items
    .map((todo, i) => ({ number: i + 1, todo }))
    .filter(({ todo }) =>
      (filter.completed === undefined || todo.completed === filter.completed)
      && (filter.priority === undefined || todo.priority === filter.priority)
      && terms.every(term => matchesTerm(todo, term)));
}

/** Distinct projects (`+`) or contexts (`@`) with how many items mention each, sorted by name */
export function countTags(list: TaskList, kind: 'projects' | 'contexts'): TagCount[] {
  const counts = new Map<string, number>();
  for (const todo of list.items) {
    for (const name of new Set(todo[kind])) {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

// --- Writing ---

export interface AddOptions {
  /** Stamped as creation date when the line carries none */
  readonly createdOn?: IsoDate;
}

export function addTodoLine(store: TodoStore, path: string, text: string, options: AddOptions = {}): DataResult<NumberedTodo> {
  if (!text.trim()) return { type: 'error', message: 'Cannot add an empty task' };
  if (LINE_BREAK_IN_TEXT_RE.test(text)) return { type: 'error', message: LINE_BREAK_ERROR };

  let todo = parseTodo(text);
  if (options.createdOn !== undefined && todo.startDate === null) {
    todo = setStartDate(todo, options.createdOn);
  }
  if (!roundTrips(todo)) {
    return { type: 'error', message: `Cannot add "${todoToString(todo)}": it would not read back the same` };
  }

  const list = addTodo(loadTodos(store, path), todo);
  saveTodos(store, list);

  const number = list.items.length;
  return { type: 'success', data: { number, todo }, message: `${number} ${todoToString(todo)}` };
}

/** Mark items done; `completedOn` becomes the completion date of items with a creation date */
export function completeTodos(store: TodoStore, path: string, itemNumbers: readonly number[], completedOn?: IsoDate): BatchResult {
  let list = loadTodos(store, path);
  const results: TaskResult[] = [];

  for (const n of itemNumbers) {
    const todo = itemAt(list, n);
    if (!todo) {
      results.push({ type: 'not-found', itemNumber: n });
    } else if (todo.completed) {
      results.push({ type: 'no-change', message: `${n} is already done` });
    } else {
      list = completeAt(list, n - 1, completedOn);
      results.push({ type: 'success', message: `Completed ${n}: ${todo.task}` });
    }
  }

  if (results.some(r => r.type === 'success')) saveTodos(store, list);
  return { results };
}

/** Mark items not done and drop their completion date */
export function reopenTodos(store: TodoStore, path: string, itemNumbers: readonly number[]): BatchResult {
  let list = loadTodos(store, path);
  const results: TaskResult[] = [];

  for (const n of itemNumbers) {
    const todo = itemAt(list, n);
    if (!todo) {
      results.push({ type: 'not-found', itemNumber: n });
    } else if (!todo.completed) {
      results.push({ type: 'no-change', message: `${n} is not done` });
    } else {
      list = updateAt(setCompletedAt(list, n - 1, false), n - 1, t => setEndDate(t, null));
      results.push({ type: 'success', message: `Reopened ${n}: ${todo.task}` });
    }
  }

  if (results.some(r => r.type === 'success')) saveTodos(store, list);
  return { results };
}

/** Set (or with `null`, clear) the priority of one item */
export function setTodoPriority(store: TodoStore, path: string, itemNumber: number, priority: string | null): TaskResult {
  const list = loadTodos(store, path);
  const todo = itemAt(list, itemNumber);
  if (!todo) return { type: 'not-found', itemNumber };
  if (todo.priority === priority) {
    return { type: 'no-change', message: `${itemNumber} already has priority ${priority ?? 'none'}` };
  }

  let updated: TaskList;
  try {
    updated = priority === null
      ? clearPriorityAt(list, itemNumber - 1)
      : setPriorityAt(list, itemNumber - 1, priority);
  } catch (err: unknown) {
    if (err instanceof InvalidPriorityError) return { type: 'error', message: err.message };
    throw err;
  }

  saveTodos(store, updated);
  return {
    type: 'success',
    message: priority === null ? `Cleared priority for ${itemNumber}` : `Set priority for ${itemNumber}: ${priority}`,
  };
}

type TextEdit = (list: TaskList, index: number, text: string) => TaskList;

function editText(store: TodoStore, path: string, itemNumber: number, text: string, edit: TextEdit): TaskResult {
  if (LINE_BREAK_IN_TEXT_RE.test(text)) return { type: 'error', message: LINE_BREAK_ERROR };

  const list = loadTodos(store, path);
  const todo = itemAt(list, itemNumber);
  if (!todo) return { type: 'not-found', itemNumber };

  const updated = edit(list, itemNumber - 1, text);
  const after = updated.items[itemNumber - 1];
  if (!after || after.task === todo.task) return { type: 'no-change', message: `${itemNumber} is unchanged` };
  if (!roundTrips(after)) {
    return { type: 'error', message: `Cannot edit ${itemNumber}: "${todoToString(after)}" would not read back the same` };
  }

  saveTodos(store, updated);
  return { type: 'success', message: `${itemNumber} ${todoToString(after)}` };
}

export function replaceTodoText(store: TodoStore, path: string, itemNumber: number, text: string): TaskResult {
  return editText(store, path, itemNumber, text, setTaskAt);
}

export function appendTodoText(store: TodoStore, path: string, itemNumber: number, text: string): TaskResult {
  return editText(store, path, itemNumber, text, appendTaskAt);
}

export function prependTodoText(store: TodoStore, path: string, itemNumber: number, text: string): TaskResult {
  return editText(store, path, itemNumber, text, prependTaskAt);
}
