/**
 * Tokenizes one todo.txt line into its prefix metadata and the remaining task text.
 *
 *   ["x "] ["(" A-Z ") "] [ date " " date " " | date " " ] task
 *
 * Every prefix token is optional. The completion marker and a lone creation
 * date must end at whitespace or at the end of the line; a priority or a
 * two-date clause may run straight into the task. The whitespace run after a
 * consumed token belongs to no field.
 * The date clause is an ordered choice: the two-date form (completion date,
 * then creation date) is tried first, and on failure the parser backtracks to
 * the one-date form (creation date only).
 */

import type { IsoDate, ParsedLine } from '../types/todo.js';
import type { Priority } from '../types/priority.js';
import { isPriority } from '../types/priority.js';
import { NoDataError } from '../errors.js';
import { parseIsoDate } from './date-parser.js';

// Sticky patterns: each one only matches at `lastIndex`
const PRIORITY_RE = /\(([A-Z])\)/y;
const DATE_RE = /\d{4}-\d{2}-\d{2}/y;

/** A successful match: the captured value and the offset just past it */
interface Match<T> {
  readonly value: T;
  readonly end: number;
}

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

/** True when `pos` sits at the end of the line or on whitespace */
function atBoundary(line: string, pos: number): boolean {
  return pos >= line.length || isWhitespace(line[pos]);
}

function skipWhitespace(line: string, pos: number): number {
  let i = pos;
  while (isWhitespace(line[i])) i++;
  return i;
}

function matchSticky(re: RegExp, line: string, pos: number): RegExpExecArray | null {
  re.lastIndex = pos;
  return re.exec(line);
}

function completionMarker(line: string, pos: number): Match<true> | null {
  if (line[pos] !== 'x' || !atBoundary(line, pos + 1)) return null;
  return { value: true, end: pos + 1 };
}

function priorityMarker(line: string, pos: number): Match<Priority> | null {
  const m = matchSticky(PRIORITY_RE, line, pos);
  if (!m) return null;

  const letter = m[1];
  const end = pos + m[0].length;
  if (!isPriority(letter)) return null;
  return { value: letter, end };
}

/** A single yyyy-MM-dd that is also a real calendar day; no boundary check */
function date(line: string, pos: number): Match<IsoDate> | null {
  const m = matchSticky(DATE_RE, line, pos);
  if (!m) return null;

  const value = parseIsoDate(m[0]);
  return value === null ? null : { value, end: pos + m[0].length };
}

interface DateClause {
  readonly endDate: IsoDate | null;
  readonly startDate: IsoDate;
}

function twoDates(line: string, pos: number): Match<DateClause> | null {
  const first = date(line, pos);
  if (!first) return null;

  const next = skipWhitespace(line, first.end);
  if (next === first.end) return null;

  const second = date(line, next);
  if (!second) return null;
  return { value: { endDate: first.value, startDate: second.value }, end: second.end };
}

// A lone date needs the boundary: `2021-01-012021-01-02 x` split into date and
// task would be written back as the two-date form
function oneDate(line: string, pos: number): Match<DateClause> | null {
  const only = date(line, pos);
  if (!only || !atBoundary(line, only.end)) return null;
  return { value: { endDate: null, startDate: only.value }, end: only.end };
}

function dateClause(line: string, pos: number): Match<DateClause> | null {
  return twoDates(line, pos) ?? oneDate(line, pos);
}

/**
 * Parse a single line (without its line terminator).
 * Throws NoDataError for the empty string; every other input parses, with
 * unrecognized text (invalid dates included) left in `task`.
 */
export function parseLine(line: string): ParsedLine {
  if (line === '') throw new NoDataError();

  let pos = skipWhitespace(line, 0);

  const done = completionMarker(line, pos);
  if (done) pos = skipWhitespace(line, done.end);

  const priority = priorityMarker(line, pos);
  if (priority) pos = skipWhitespace(line, priority.end);

  const dates = dateClause(line, pos);
  if (dates) pos = skipWhitespace(line, dates.end);

  return {
    completed: done !== null,
    priority: priority?.value ?? null,
    endDate: dates?.value.endDate ?? null,
    startDate: dates?.value.startDate ?? null,
    task: line.slice(pos),
  };
}
