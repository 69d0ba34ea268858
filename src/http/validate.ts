import type { z } from 'zod';
import type { HonoRequest } from 'hono';
import { errorBody, type ErrorBody } from './errors.js';

export type BodyResult<T> = { ok: true; data: T } | { ok: false; body: ErrorBody };

/**
 * Parse a JSON request body against `schema`. Malformed JSON and schema
 * violations both come back as VALIDATION_FAILED bodies.
 */
export async function readBody<T>(req: HonoRequest, schema: z.ZodType<T>): Promise<BodyResult<T>> {
  let raw: unknown;
  try {
    raw = await req.json();
  } catch {
    return { ok: false, body: errorBody('VALIDATION_FAILED', 'Request body must be valid JSON') };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const { fieldErrors, formErrors } = parsed.error.flatten();
    return {
      ok: false,
      body: errorBody('VALIDATION_FAILED', 'Invalid request body', { fieldErrors, formErrors }),
    };
  }
  return { ok: true, data: parsed.data };
}
