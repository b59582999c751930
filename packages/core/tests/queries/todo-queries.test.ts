import { describe, it, expect, beforeEach } from 'vitest';
import {
  loadTodos, findTodos, countTags, addTodoLine, completeTodos, reopenTodos,
  setTodoPriority, replaceTodoText, appendTodoText, prependTodoText,
} from '../../src/queries/todo-queries.js';
import { InMemoryTodoStore } from '../../src/storage/memory-store.js';
import { IoError } from '../../src/errors.js';

const PATH = 'todo.txt';

let store: InMemoryTodoStore;

beforeEach(() => {
  store = new InMemoryTodoStore();
  store.setFile(PATH, [
    '(A) 2021-01-01 call Mom @phone',
    'x 2021-01-03 2021-01-02 file taxes +finance',
    'buy milk @store +groceries',
    '(B) plan trip +travel +finance',
  ].join('\n'));
});

describe('loadTodos', () => {
  it('leaves out blank lines so item numbers stay put across saves', () => {
    store.setFile(PATH, 'a\n  \t\nb');
    expect(findTodos(loadTodos(store, PATH)).map(n => n.todo.task)).toEqual(['a', 'b']);

    expect(completeTodos(store, PATH, [2]).results).toEqual([{ type: 'success', message: 'Completed 2: b' }]);
    expect(store.getFile(PATH)).toBe('a\nx b');
    expect(findTodos(loadTodos(store, PATH)).map(n => n.number)).toEqual([1, 2]);
  });
});

describe('findTodos', () => {
  it('returns every item with its number when unfiltered', () => {
    expect(findTodos(loadTodos(store, PATH)).map(n => n.number)).toEqual([1, 2, 3, 4]);
  });

  it('filters by project and context', () => {
    const list = loadTodos(store, PATH);
    expect(findTodos(list, { terms: ['+finance'] }).map(n => n.number)).toEqual([2, 4]);
    expect(findTodos(list, { terms: ['@phone'] }).map(n => n.number)).toEqual([1]);
  });

  it('matches plain text case-insensitively', () => {
    expect(findTodos(loadTodos(store, PATH), { terms: ['MILK'] }).map(n => n.number)).toEqual([3]);
  });

  it('combines terms, completion and priority', () => {
    const list = loadTodos(store, PATH);
    expect(findTodos(list, { completed: false }).map(n => n.number)).toEqual([1, 3, 4]);
    expect(findTodos(list, { completed: true }).map(n => n.number)).toEqual([2]);
    expect(findTodos(list, { priority: 'B', terms: ['trip'] }).map(n => n.number)).toEqual([4]);
    expect(findTodos(list, { priority: 'A', terms: ['trip'] })).toEqual([]);
  });
});

describe('countTags', () => {
  it('counts items per project, sorted by name', () => {
    expect(countTags(loadTodos(store, PATH), 'projects')).toEqual([
      { name: 'finance', count: 2 },
      { name: 'groceries', count: 1 },
      { name: 'travel', count: 1 },
    ]);
  });

  it('counts an item once even when it repeats a tag', () => {
    store.setFile(PATH, '@home @home\n@home');
    expect(countTags(loadTodos(store, PATH), 'contexts')).toEqual([{ name: 'home', count: 2 }]);
  });
});

describe('addTodoLine', () => {
  it('appends the line and reports its number', () => {
    const result = addTodoLine(store, PATH, '(C) water plants +garden');
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;
    expect(result.data.number).toBe(5);
    expect(result.data.todo.projects).toEqual(['garden']);
    expect(result.message).toBe('5 (C) water plants +garden');
    expect(store.getFile(PATH)!.split('\n')[4]).toBe('(C) water plants +garden');
  });

  it('stamps the creation date when asked', () => {
    const result = addTodoLine(store, PATH, '(C) water plants', { createdOn: '2026-02-08' });
    expect(result.type === 'success' && result.message).toBe('5 (C) 2026-02-08 water plants');
  });

  it('keeps a creation date already on the line', () => {
    const result = addTodoLine(store, PATH, '2020-01-01 old idea', { createdOn: '2026-02-08' });
    expect(result.type === 'success' && result.data.todo.startDate).toBe('2020-01-01');
  });

  it('creates the file when it does not exist yet', () => {
    addTodoLine(store, 'new.txt', 'first');
    expect(store.getFile('new.txt')).toBe('first');
  });

  it('rejects blank text without writing', () => {
    expect(addTodoLine(store, 'new.txt', '   ').type).toBe('error');
    expect(store.getFile('new.txt')).toBeUndefined();
  });

  it('rejects text with line breaks', () => {
    expect(addTodoLine(store, PATH, 'one\ntwo')).toEqual({ type: 'error', message: 'Task text cannot contain line breaks' });
    expect(loadTodos(store, PATH).items).toHaveLength(4);
  });

  it('rejects a line whose stamped date would change how it reads back', () => {
    const result = addTodoLine(store, PATH, 'x 2021-01-01x foo', { createdOn: '2026-02-08' });
    expect(result).toEqual({
      type: 'error',
      message: 'Cannot add "x 2026-02-08 2021-01-01x foo": it would not read back the same',
    });
    expect(loadTodos(store, PATH).items).toHaveLength(4);
  });

  it('propagates write failures', () => {
    store.failWrites = true;
    expect(() => addTodoLine(store, PATH, 'anything')).toThrow(IoError);
  });
});

describe('completeTodos', () => {
  it('completes items and stamps completion dates', () => {
    const batch = completeTodos(store, PATH, [1, 3], '2021-01-05');
    expect(batch.results.map(r => r.type)).toEqual(['success', 'success']);

    const lines = store.getFile(PATH)!.split('\n');
    expect(lines[0]).toBe('x (A) 2021-01-05 2021-01-01 call Mom @phone');
    expect(lines[2]).toBe('x buy milk @store +groceries');
  });

  it('reports done items and missing numbers', () => {
    const batch = completeTodos(store, PATH, [2, 9, 0]);
    expect(batch.results).toEqual([
      { type: 'no-change', message: '2 is already done' },
      { type: 'not-found', itemNumber: 9 },
      { type: 'not-found', itemNumber: 0 },
    ]);
  });

  it('does not write when nothing changed', () => {
    store.failWrites = true;
    expect(() => completeTodos(store, PATH, [2, 9])).not.toThrow();
  });
});

describe('reopenTodos', () => {
  it('reopens a done item and drops its completion date', () => {
    const batch = reopenTodos(store, PATH, [2]);
    expect(batch.results[0]).toEqual({ type: 'success', message: 'Reopened 2: file taxes +finance' });
    expect(store.getFile(PATH)!.split('\n')[1]).toBe('2021-01-02 file taxes +finance');
  });

  it('reports items that are not done', () => {
    expect(reopenTodos(store, PATH, [1]).results[0]!.type).toBe('no-change');
  });
});

describe('setTodoPriority', () => {
  it('sets a priority', () => {
    expect(setTodoPriority(store, PATH, 3, 'C')).toEqual({ type: 'success', message: 'Set priority for 3: C' });
    expect(store.getFile(PATH)!.split('\n')[2]).toBe('(C) buy milk @store +groceries');
  });

  it('clears a priority', () => {
    expect(setTodoPriority(store, PATH, 1, null).type).toBe('success');
    expect(store.getFile(PATH)!.split('\n')[0]).toBe('2021-01-01 call Mom @phone');
  });

  it('reports an unchanged priority', () => {
    expect(setTodoPriority(store, PATH, 4, 'B').type).toBe('no-change');
    expect(setTodoPriority(store, PATH, 3, null).type).toBe('no-change');
  });

  it('turns an invalid priority into an error result', () => {
    expect(setTodoPriority(store, PATH, 3, 'AA')).toEqual({
      type: 'error',
      message: 'Invalid priority "AA": expected a single letter A-Z',
    });
  });

  it('reports a missing item', () => {
    expect(setTodoPriority(store, PATH, 5, 'A')).toEqual({ type: 'not-found', itemNumber: 5 });
  });
});

describe('text edits', () => {
  it('replaces the task text', () => {
    expect(replaceTodoText(store, PATH, 3, 'buy oat milk @store')).toEqual({
      type: 'success',
      message: '3 buy oat milk @store',
    });
  });

  it('appends and prepends to the task text', () => {
    appendTodoText(store, PATH, 1, 'tonight');
    prependTodoText(store, PATH, 1, 'really');
    expect(store.getFile(PATH)!.split('\n')[0]).toBe('(A) 2021-01-01 really call Mom @phone tonight');
  });

  it('reports an edit that changes nothing', () => {
    expect(appendTodoText(store, PATH, 1, '').type).toBe('no-change');
  });

  it('reports a missing item', () => {
    expect(replaceTodoText(store, PATH, 42, 'x')).toEqual({ type: 'not-found', itemNumber: 42 });
  });

  it('rejects text the parser would read as a prefix token', () => {
    expect(replaceTodoText(store, PATH, 3, 'x marks the spot')).toEqual({
      type: 'error',
      message: 'Cannot edit 3: "x marks the spot" would not read back the same',
    });
    expect(prependTodoText(store, PATH, 1, '2021-02-02').type).toBe('error');
    expect(store.getFile(PATH)!.split('\n')[2]).toBe('buy milk @store +groceries');
  });

  it('accepts the same text behind existing prefix tokens', () => {
    expect(replaceTodoText(store, PATH, 1, 'x marks the spot')).toEqual({
      type: 'success',
      message: '1 (A) 2021-01-01 x marks the spot',
    });
  });

  it('rejects text with line breaks', () => {
    expect(appendTodoText(store, PATH, 1, 'a\nb')).toEqual({ type: 'error', message: 'Task text cannot contain line breaks' });
    expect(appendTodoText(store, PATH, 1, 'a\r')).toEqual({ type: 'error', message: 'Task text cannot contain line breaks' });
    expect(loadTodos(store, PATH).items).toHaveLength(4);
  });

  it('drops leading whitespace from the new text', () => {
    expect(replaceTodoText(store, PATH, 3, '  oat milk')).toEqual({ type: 'success', message: '3 oat milk' });
  });
});
