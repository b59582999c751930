import { join } from 'node:path';
import { homedir } from 'node:os';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Returns the todo.txt path to use when none is given on the command line.
 * Priority: TODO_FILE > TODO_DIR/todo.txt > platform data directory.
 */
export function getDefaultTodoPath(
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string {
  const file = env['TODO_FILE'];
  if (file) return file;

  const todoDir = env['TODO_DIR'];
  if (todoDir) return join(todoDir, 'todo.txt');

  let dir: string;
  if (platform === 'darwin') {
    dir = join(home, 'Library', 'Application Support', 'todoline');
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(home, 'AppData', 'Roaming'), 'todoline');
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] ?? join(home, '.local', 'share'), 'todoline');
  }

  return join(dir, 'todo.txt');
}
