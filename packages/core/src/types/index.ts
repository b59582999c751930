export { isPriority } from './priority.js';
export type { Priority } from './priority.js';
export type { IsoDate, ParsedLine, TodoFields, Todo } from './todo.js';
export type { TaskResult, DataResult, BatchResult } from './results.js';
