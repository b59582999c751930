/**
 * Adapter: TodoStore backed by files on disk (synchronous node:fs).
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { IoError } from '../errors.js';
import { LINE_BREAK_RE } from './ports.js';
import type { TodoStore } from './ports.js';

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

export class FileTodoStore implements TodoStore {
  /** A file that does not exist yet reads as no lines */
  readLines(path: string): string[] {
    let content: string;
    try {
      content = readFileSync(path, 'utf8');
    } catch (err: unknown) {
      if (errorCode(err) === 'ENOENT') return [];
      throw new IoError(`Could not read ${path}`, path, { cause: err });
    }
    return content.split(LINE_BREAK_RE);
  }

  overwrite(path: string, content: string): void {
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content, 'utf8');
    } catch (err: unknown) {
      throw new IoError(`Could not write ${path}`, path, { cause: err });
    }
  }
}
