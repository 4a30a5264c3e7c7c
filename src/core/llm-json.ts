import type { z } from 'zod';

/**
 * Pulls the first JSON object out of a model reply (bare, or inside a
 * ```json fence) and validates it against `schema`.
 */
export function parseJsonReply<T extends z.ZodTypeAny>(reply: string, schema: T): z.infer<T> {
  const fenced = reply.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : reply;

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('Model reply does not contain a JSON object');
  }

  const parsed: unknown = JSON.parse(body.slice(start, end + 1));
  return schema.parse(parsed);
}
