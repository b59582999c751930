/**
 * chalk-based output formatting for todo lines and operation results.
 */

import chalk from 'chalk';
import type { Todo, TaskResult, BatchResult, TagCount } from '@todoline/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length]!;
}

// --- Formatting functions ---

export function formatPriority(priority: string | null): string {
  if (priority === null) return '';
  const label = `(${priority})`;
  switch (priority) {
    case 'A': return chalk.red.bold(label);
    case 'B': return chalk.yellow(label);
    case 'C': return chalk.blue(label);
    default: return label;
  }
}

/** Color +project and @context tokens, leaving whitespace untouched */
export function formatTaskText(task: string): string {
  return task
    .split(/(\s+)/)
    .map(token => token.length > 1 && (token.startsWith('+') || token.startsWith('@'))
      ? tagColor(token.slice(1))(token)
      : token)
    .join('');
}

/** One numbered line, e.g. " 3 (A) call Mom @phone"; done items are dimmed */
export function formatTodo(todo: Todo, itemNumber: number, numberWidth = 1): string {
  const num = String(itemNumber).padStart(numberWidth);

  const parts: string[] = [];
  if (todo.completed) parts.push('x');
  if (todo.priority !== null) parts.push(formatPriority(todo.priority));
  if (todo.endDate !== null) parts.push(chalk.dim(todo.endDate));
  if (todo.startDate !== null) parts.push(chalk.dim(todo.startDate));
  parts.push(formatTaskText(todo.task));

  const body = parts.join(' ');
  return `${chalk.gray(num)} ${todo.completed ? chalk.dim(body) : body}`;
}

export function formatTagCount({ name, count }: TagCount, sigil: '+' | '@'): string {
  return `${tagColor(name)(sigil + name)} ${chalk.dim(`(${count})`)}`;
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`No item ${result.itemNumber}`); break;
    case 'no-change': info(result.message); break;
    case 'error': error(result.message); break;
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    printResult(result);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}
