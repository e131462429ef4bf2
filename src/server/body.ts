import type { Context } from 'hono';
import type { z } from 'zod';
import { ValidationError } from '../errors.js';

// Читает JSON-тело и проверяет его схемой; ошибки — ZodError или ValidationError.
export async function readBody<T>(c: Context, schema: z.ZodType<T>): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  return schema.parse(body);
}
