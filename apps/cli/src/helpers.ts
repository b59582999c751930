/**
 * CLI helpers: file resolution, argument parsing, error handling.
 */

import type { Command } from 'commander';
import { formatDate } from '@todoline/core';
import * as out from './output.js';

export type GlobalOptions = {
  file?: string;
};

/** The todo file for a command: explicit --file, else the configured default */
export function resolveTodoPath(cmd: Command, defaultPath: () => string): string {
  return cmd.optsWithGlobals<GlobalOptions>().file ?? defaultPath();
}

/** Parse 1-based item numbers; anything that is not a positive integer is rejected */
export function parseItemNumber(arg: string): number {
  if (!/^\d+$/.test(arg) || Number(arg) < 1) {
    throw new Error(`Invalid item number: ${arg}`);
  }
  return Number(arg);
}

/**
 * Parse a priority argument: a letter (either case) or 'clear'/'none' (null).
 * Anything else is passed through uppercased so the core can reject it.
 */
export function parsePriorityArg(level: string): string | null {
  switch (level.toLowerCase()) {
    case 'clear': case 'none': case '-': return null;
    default: return level.toUpperCase();
  }
}

/** Join variadic words back into one line of text */
export function joinWords(words: readonly string[]): string {
  return words.join(' ');
}

export function today(now: Date = new Date()): string {
  return formatDate(now);
}

/**
 * Run a command action, printing any thrown error instead of crashing.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
  }
}
