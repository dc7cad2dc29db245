import { z } from 'zod';

export const MAX_LIMIT = 100;

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).optional(),
});

export function parseLimit(
  query: unknown,
  fallback: number,
): { ok: true; limit: number } | { ok: false; error: string } {
  const result = limitQuerySchema.safeParse(query);
  if (!result.success) {
    return { ok: false, error: `limit must be an integer between 1 and ${MAX_LIMIT}` };
  }
  return { ok: true, limit: result.data.limit ?? fallback };
}
