export {
  loadTodos, saveTodos, findTodos, countTags, addTodoLine, completeTodos, reopenTodos,
  setTodoPriority, replaceTodoText, appendTodoText, prependTodoText,
} from './todo-queries.js';
export type { NumberedTodo, TodoFilter, TagCount, AddOptions } from './todo-queries.js';
