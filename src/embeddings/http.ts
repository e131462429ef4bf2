// Общий HTTP-клиент для провайдеров эмбеддингов: retry на 429 и 5xx.
import { z } from 'zod';

export interface RetryPolicy {
  // Имя провайдера в сообщениях об ошибках.
  name: string;
  // Метка в логе повторов.
  label: string;
  maxRetries: number;
  // Базовая задержка экспоненциального backoff при 5xx (мс).
  baseDelayMs: number;
  // Задержка на попытку при 429 (мс); без неё 429 ждёт как 5xx.
  rateLimitDelayMs?: number;
}

// Формат ответа OpenAI-совместимых API ({ data: [{ index, embedding }] }).
export const EmbeddingDataResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number(),
    embedding: z.array(z.number()),
  })),
});

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * POST JSON с повторами; возвращает разобранное тело ответа.
 * Остальные не-ok статусы — ошибка без повторов.
 */
export async function postJsonWithRetry<T>(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  schema: z.ZodType<T>,
  policy: RetryPolicy,
): Promise<T> {
  const payload = JSON.stringify(body);
  let lastStatus = 0;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (attempt > 0) {
      const delayMs = lastStatus === 429 && policy.rateLimitDelayMs !== undefined
        ? policy.rateLimitDelayMs * attempt
        : policy.baseDelayMs * Math.pow(2, attempt - 1);
      process.stderr.write(
        `  [${policy.label}] retry ${attempt}/${policy.maxRetries}, wait ${Math.round(delayMs / 1000)}s\n`,
      );
      await delay(delayMs);
    }

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: payload,
    });

    if (response.status === 429 || response.status >= 500) {
      lastStatus = response.status;
      lastError = new Error(`${policy.name} API error: ${response.status} ${response.statusText}`);
      continue;
    }

    if (!response.ok) {
      throw new Error(`${policy.name} API error: ${response.status} ${response.statusText}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${policy.name} API returned an unexpected response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  throw lastError ?? new Error(`${policy.name} API: retries exhausted`);
}

// Упорядочивает векторы по index ответа.
export function sortedEmbeddings(response: z.infer<typeof EmbeddingDataResponseSchema>): number[][] {
  return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
}

// Разбивает входы на батчи фиксированного размера.
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
