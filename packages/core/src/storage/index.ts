export type { LineSource, Sink, TodoStore } from './ports.js';
export { FileTodoStore } from './file-store.js';
export { InMemoryTodoStore } from './memory-store.js';
