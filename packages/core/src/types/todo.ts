import type { Priority } from './priority.js';

/** Simple type alias for documentation: a validated yyyy-MM-dd calendar date */
export type IsoDate = string;

/** Fields recognized on a single line; `task` is whatever follows the prefix tokens */
export interface ParsedLine {
  readonly completed: boolean;
  readonly priority: Priority | null;
  readonly endDate: IsoDate | null; // completion date
  readonly startDate: IsoDate | null; // creation date
  readonly task: string;
}

export type TodoFields = ParsedLine;

export interface Todo extends TodoFields {
  /** Derived from `task`, never set directly */
  readonly projects: readonly string[];
  /** Derived from `task`, never set directly */
  readonly contexts: readonly string[];
}
