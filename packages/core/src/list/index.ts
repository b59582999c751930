export {
  createTaskList, readTaskList, readTaskListFrom, serializeTaskList, writeTaskList,
  addTodo, updateAt, completeAt, setCompletedAt, setPriorityAt, clearPriorityAt,
  setTaskAt, appendTaskAt, prependTaskAt,
} from './task-list.js';
export type { TaskList } from './task-list.js';
