import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OllamaTextEmbedder } from '../ollama.js';
import { errorResponse, requestAt, type FetchMock } from './helpers.js';

const CONFIG = {
  baseUrl: 'http://ollama.test:11434//',
  model: 'nomic-embed-text',
  dimensions: 3,
};

function jsonResponse(payload: unknown): object {
  return { ok: true, status: 200, json: async () => payload };
}

describe('OllamaTextEmbedder', () => {
  let fetchMock: FetchMock;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('embedBatch() вызывает /api/embed без завершающих слэшей в адресе', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 0, 0], [0, 1, 0]] }));

    const results = await new OllamaTextEmbedder(CONFIG).embedBatch(['a', 'b']);

    expect(results).toEqual([[1, 0, 0], [0, 1, 0]]);
    const request = requestAt(fetchMock, 0);
    expect(request.url).toBe('http://ollama.test:11434/api/embed');
    expect(request.body).toEqual({ model: 'nomic-embed-text', input: ['a', 'b'] });
  });

  it('embedBatch() разбивает вход на батчи по 32', async () => {
    fetchMock.mockImplementation(async (_url: string, options: RequestInit) => {
      const body = JSON.parse(options.body as string) as { input: string[] };
      return jsonResponse({ embeddings: body.input.map(() => [0, 0, 1]) });
    });

    const results = await new OllamaTextEmbedder(CONFIG).embedBatch(Array.from({ length: 40 }, (_, i) => `t${i}`));

    expect(results).toHaveLength(40);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('embed() переходит на /api/embeddings, если /api/embed недоступен', async () => {
    fetchMock
      .mockResolvedValueOnce(errorResponse(404, 'Not Found', '404 page not found'))
      .mockResolvedValueOnce(jsonResponse({ embedding: [0.5, 0.5, 0] }));

    const result = await new OllamaTextEmbedder(CONFIG).embed('hello');

    expect(result).toEqual([0.5, 0.5, 0]);
    const fallback = requestAt(fetchMock, 1);
    expect(fallback.url).toBe('http://ollama.test:11434/api/embeddings');
    expect(fallback.body).toEqual({ model: 'nomic-embed-text', prompt: 'hello' });
  });

  it('embedBatch() с несколькими текстами пробрасывает ошибку /api/embed', async () => {
    fetchMock.mockResolvedValueOnce(errorResponse(500, 'Internal Server Error', 'model not loaded'));

    await expect(new OllamaTextEmbedder(CONFIG).embedBatch(['a', 'b'])).rejects.toThrow(
      'Ollama request failed (500) /api/embed: model not loaded',
    );
    expect(fetchMock).toHaveBeenCalledOnce();
  });

  it('embedQuery() совпадает с embed()', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[0, 0, 1]] }));

    expect(await new OllamaTextEmbedder(CONFIG).embedQuery('q')).toEqual([0, 0, 1]);
    expect(requestAt(fetchMock, 0).body).toEqual({ model: 'nomic-embed-text', input: ['q'] });
  });

  it('выбрасывает ошибку, если fallback не вернул embedding', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({}))
      .mockResolvedValueOnce(jsonResponse({}));

    await expect(new OllamaTextEmbedder(CONFIG).embed('x')).rejects.toThrow(
      'Ollama /api/embeddings response does not contain embedding',
    );
  });
});
