/**
 * Ports: the line source a task list is read from and the sink it is
 * written to. The core only ever talks to these interfaces.
 */

/** Splits stored content into lines; `\r\n` and `\n` both end a line */
export const LINE_BREAK_RE = /\r?\n/;

/** Yields the raw lines of a named location, line terminators removed */
export interface LineSource {
  readLines(path: string): string[];
}

/** Replaces the full contents of a named location */
export interface Sink {
  overwrite(path: string, content: string): void;
}

export interface TodoStore extends LineSource, Sink {}
