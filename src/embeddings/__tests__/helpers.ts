import { vi } from 'vitest';

export type FetchMock = ReturnType<typeof vi.fn>;

// Вектор заданной размерности с различимыми компонентами.
export function fakeVector(dimensions: number, seed = 0): number[] {
  return Array.from({ length: dimensions }, (_, i) => (i + seed) * 0.001);
}

// Ответ OpenAI-совместимого API.
export function dataResponse(vectors: number[][]): { ok: true; status: 200; json: () => Promise<unknown> } {
  return {
    ok: true,
    status: 200,
    json: async () => ({ data: vectors.map((embedding, index) => ({ index, embedding })) }),
  };
}

export function errorResponse(status: number, statusText: string, text = ''): object {
  return { ok: false, status, statusText, text: async () => text };
}

// URL и JSON-тело n-го вызова fetch.
export function requestAt(fetchMock: FetchMock, n: number): { url: string; body: Record<string, unknown>; headers: Record<string, string> } {
  const [url, options] = fetchMock.mock.calls[n] as [string, RequestInit];
  return {
    url,
    body: JSON.parse(options.body as string) as Record<string, unknown>,
    headers: options.headers as Record<string, string>,
  };
}
