/**
 * The Todo record: assembly from a parsed line, derived projects/contexts,
 * serialization back to a line, and setters that return new records.
 *
 * `projects` and `contexts` are always recomputed from `task`, never patched.
 */

import type { IsoDate, ParsedLine, Todo, TodoFields } from '../types/todo.js';
import { isPriority } from '../types/priority.js';
import { InvalidDateError, InvalidPriorityError } from '../errors.js';
import { parseLine } from '../parsers/line-parser.js';
import { parseIsoDate } from '../parsers/date-parser.js';

export type TagSigil = '+' | '@';

/**
 * Collect the text after `sigil` for every whitespace-delimited token of
 * `task` that starts with it. Order and duplicates are kept.
 */
export function extractTags(task: string, sigil: TagSigil): string[] {
  return task
    .split(/\s+/)
    .filter(token => token.startsWith(sigil))
    .map(token => token.slice(sigil.length));
}

const LEADING_WHITESPACE_RE = /^[ \t]+/;

// The parser consumes whitespace before the task, so a stored task never starts with it
function withTask(fields: TodoFields, text: string): Todo {
  const task = text.replace(LEADING_WHITESPACE_RE, '');
  return {
    completed: fields.completed,
    priority: fields.priority,
    endDate: fields.endDate,
    startDate: fields.startDate,
    task,
    projects: extractTags(task, '+'),
    contexts: extractTags(task, '@'),
  };
}

function checkDate(value: IsoDate | null): IsoDate | null {
  if (value === null) return null;
  if (parseIsoDate(value) === null) throw new InvalidDateError(value);
  return value;
}

/** A completion date is only written in the two-date form, after a creation date */
function checkDatePair(endDate: IsoDate | null, startDate: IsoDate | null): void {
  if (endDate !== null && startDate === null) {
    throw new InvalidDateError(endDate, `Completion date "${endDate}" requires a creation date`);
  }
}

export function fromParsed(parsed: ParsedLine): Todo {
  return withTask(parsed, parsed.task);
}

/** Parse one line straight into a Todo. Throws NoDataError for '' */
export function parseTodo(line: string): Todo {
  return fromParsed(parseLine(line));
}

/** Build a Todo from settable fields, validating priority and dates */
export function createTodo(fields: Partial<TodoFields> = {}): Todo {
  const priority = fields.priority ?? null;
  if (priority !== null && !isPriority(priority)) throw new InvalidPriorityError(priority);

  const endDate = checkDate(fields.endDate ?? null);
  const startDate = checkDate(fields.startDate ?? null);
  checkDatePair(endDate, startDate);

  return withTask({ completed: fields.completed ?? false, priority, endDate, startDate, task: '' }, fields.task ?? '');
}

/** Serialize in token order: completion, priority, completion date, creation date, task */
export function todoToString(todo: TodoFields): string {
  let line = '';
  if (todo.completed) line += 'x ';
  if (todo.priority !== null) line += `(${todo.priority}) `;
  if (todo.endDate !== null) line += `${todo.endDate} `;
  if (todo.startDate !== null) line += `${todo.startDate} `;
  return line + todo.task;
}

/**
 * True when writing `todo` out and reading the line back gives the same
 * record. Task text that starts with something the grammar reads as a prefix
 * token (`x`, a priority, a date) fails this, as does a blank record, which
 * serializes to an empty line.
 */
export function roundTrips(todo: Todo): boolean {
  const line = todoToString(todo);
  if (line === '') return false;

  const reread = parseTodo(line);
  return reread.completed === todo.completed
    && reread.priority === todo.priority
    && reread.endDate === todo.endDate
    && reread.startDate === todo.startDate
    && reread.task === todo.task;
}

// --- Setters ---

export function setPriority(todo: Todo, priority: string): Todo {
  if (!isPriority(priority)) throw new InvalidPriorityError(priority);
  return { ...todo, priority };
}

export function clearPriority(todo: Todo): Todo {
  return { ...todo, priority: null };
}

export function setStartDate(todo: Todo, date: IsoDate | null): Todo {
  const startDate = checkDate(date);
  checkDatePair(todo.endDate, startDate);
  return { ...todo, startDate };
}

export function setEndDate(todo: Todo, date: IsoDate | null): Todo {
  const endDate = checkDate(date);
  checkDatePair(endDate, todo.startDate);
  return { ...todo, endDate };
}

export function setCompleted(todo: Todo, completed: boolean): Todo {
  return { ...todo, completed };
}

export function complete(todo: Todo): Todo {
  return setCompleted(todo, true);
}

/** Join two pieces of task text with a single space, skipping empty sides */
function joinText(left: string, right: string): string {
  if (left === '') return right;
  if (right === '') return left;
  return `${left} ${right}`;
}

export function setTask(todo: Todo, task: string): Todo {
  return withTask(todo, task);
}

export function appendTask(todo: Todo, text: string): Todo {
  return withTask(todo, joinText(todo.task, text));
}

export function prependTask(todo: Todo, text: string): Todo {
  return withTask(todo, joinText(text, todo.task));
}
