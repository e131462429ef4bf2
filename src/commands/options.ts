// Разбор значений опций командной строки.
import { InvalidArgumentError } from 'commander';
import { errorMessage } from '../errors.js';

// Повторяемая опция: -l cs -l py, а также -l cs,py.
export function collect(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(',').map((v) => v.trim()).filter((v) => v.length > 0)];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

// Порт 0 допустим: система выберет свободный.
export function parsePort(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Expected a port number between 0 and 65535.');
  }
  return parsed;
}

// Сообщение об ошибке настройки и выход с кодом 1.
export function exitWithError(error: unknown): never {
  console.error(`Ошибка: ${errorMessage(error)}`);
  process.exit(1);
}
