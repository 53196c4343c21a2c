import type { Context } from 'hono';
import type { z } from 'zod';

export type ParsedBody<T> = { success: true; data: T } | { success: false; error: string };

/**
 * Reads the JSON body and validates it; an empty body counts as `{}`
 * so optional-only schemas still pass.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<ParsedBody<z.infer<S>>> {
  let body: unknown = {};
  const raw = await c.req.text();
  if (raw.trim().length > 0) {
    try {
      body = JSON.parse(raw);
    } catch {
      return { success: false, error: 'Invalid JSON body' };
    }
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return {
      success: false,
      error: parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; '),
    };
  }

  return { success: true, data: parsed.data };
}
