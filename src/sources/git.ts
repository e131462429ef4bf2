import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';

const execFile = promisify(execFileCb);

// Запуск git в каталоге cwd; возвращает stdout.
export type GitRunner = (cwd: string, args: string[]) => Promise<string>;

// Изменение рабочего дерева относительно HEAD.
export type WorkingTreeChange =
  | { status: 'added' | 'modified' | 'deleted'; path: string }
  | { status: 'renamed'; path: string; oldPath: string };

// Большие репозитории дают объёмный вывод diff.
const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Вызывает git через execFile (не exec), без shell.
 */
export const runGit: GitRunner = async (cwd, args) => {
  const { stdout } = await execFile('git', ['-C', cwd, ...args], { maxBuffer: MAX_BUFFER });
  return stdout;
};

// Находится ли каталог внутри рабочего дерева git.
export async function isGitWorkTree(dir: string, run: GitRunner = runGit): Promise<boolean> {
  try {
    const output = await run(dir, ['rev-parse', '--is-inside-work-tree']);
    return output.trim() === 'true';
  } catch {
    return false;
  }
}

// Разбивает вывод с -z на элементы.
export function parseNullSeparated(output: string): string[] {
  return output.split('\0').filter((item) => item.length > 0);
}

/**
 * Разбирает `git diff --name-status -z`.
 * Для R и C за статусом следуют два пути: старый и новый.
 */
export function parseNameStatus(output: string): WorkingTreeChange[] {
  const tokens = parseNullSeparated(output);
  const changes: WorkingTreeChange[] = [];

  let i = 0;
  while (i < tokens.length) {
    const code = tokens[i] ?? '';
    const letter = code.charAt(0);

    if (letter === 'R' || letter === 'C') {
      const oldPath = tokens[i + 1];
      const newPath = tokens[i + 2];
      i += 3;
      if (oldPath === undefined || newPath === undefined) {
        break;
      }
      changes.push(letter === 'R'
        ? { status: 'renamed', path: newPath, oldPath }
        : { status: 'added', path: newPath });
      continue;
    }

    const path = tokens[i + 1];
    i += 2;
    if (path === undefined) {
      break;
    }

    switch (letter) {
    case 'A':
      changes.push({ status: 'added', path });
      break;
    case 'D':
      changes.push({ status: 'deleted', path });
      break;
    case 'M':
    case 'T':
    case 'U':
      changes.push({ status: 'modified', path });
      break;
    default:
      // X (unknown) и B (broken pairing) не индексируем.
      break;
    }
  }

  return changes;
}

/**
 * Изменения рабочего дерева относительно HEAD, включая staged,
 * плюс неотслеживаемые файлы как добавленные. Пути относительны root.
 */
export async function listWorkingTreeChanges(
  root: string,
  run: GitRunner = runGit,
): Promise<WorkingTreeChange[]> {
  const diff = await run(root, ['diff', '--name-status', '-z', '-M', '--relative', 'HEAD', '--']);
  const untracked = await run(root, ['ls-files', '--others', '--exclude-standard', '-z']);

  return [
    ...parseNameStatus(diff),
    ...parseNullSeparated(untracked).map((path): WorkingTreeChange => ({ status: 'added', path })),
  ];
}
