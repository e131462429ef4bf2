import { vi } from 'vitest';
import type postgres from 'postgres';

// Фейковый tagged template: отвечает очередным результатом из списка.
// Ошибка бросается синхронно, как и при вызове фрагментов sql``.
export function fakeSql(...responses: unknown[]): { sql: postgres.Sql; calls: Array<{ text: string; values: unknown[] }> } {
  const calls: Array<{ text: string; values: unknown[] }> = [];
  const fn = vi.fn((strings: TemplateStringsArray, ...values: unknown[]) => {
    calls.push({ text: strings.join('?'), values });
    const next = responses.shift();
    if (next instanceof Error) {
      throw next;
    }
    return Promise.resolve(next);
  });
  return { sql: fn as unknown as postgres.Sql, calls };
}
