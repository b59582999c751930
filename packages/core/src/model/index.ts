export {
  extractTags, fromParsed, parseTodo, createTodo, todoToString, roundTrips,
  setPriority, clearPriority, setStartDate, setEndDate, setCompleted, complete,
  setTask, appendTask, prependTask,
} from './todo.js';
export type { TagSigil } from './todo.js';
