/**
 * Adapter: InMemoryTodoStore
 *
 * TodoStore kept in a Map<string, string>, for tests and for callers that
 * have no file to back the list.
 */

import { IoError } from '../errors.js';
import { LINE_BREAK_RE } from './ports.js';
import type { TodoStore } from './ports.js';

export class InMemoryTodoStore implements TodoStore {
  private files = new Map<string, string>();

  /** When set, every overwrite fails with an IoError */
  failWrites = false;

  // --- TodoStore interface ---

  readLines(path: string): string[] {
    const content = this.files.get(path);
    return content === undefined ? [] : content.split(LINE_BREAK_RE);
  }

  overwrite(path: string, content: string): void {
    if (this.failWrites) {
      throw new IoError(`Could not write ${path}`, path, { cause: new Error('write disabled') });
    }
    this.files.set(path, content);
  }

  // --- Test helpers ---

  /** Set a file directly (convenience for test setup) */
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  getFile(path: string): string | undefined {
    return this.files.get(path);
  }
}
