import { z } from 'zod';

/** Extracts text from one documented response shape, or `undefined` if it does not match. */
export type ResponseShape = (json: unknown) => string | undefined;

export function shape<S extends z.ZodTypeAny>(
  schema: S,
  pick: (value: z.infer<S>) => string | null | undefined
): ResponseShape {
  return (json) => {
    const parsed = schema.safeParse(json);
    if (!parsed.success) return undefined;
    const text = pick(parsed.data);
    return typeof text === 'string' && text.length > 0 ? text : undefined;
  };
}

const ErrorDetailSchema = z
  .object({
    code: z.union([z.string(), z.number()]).nullable().optional(),
    message: z.string().nullable().optional(),
    type: z.string().nullable().optional(),
    status: z.string().nullable().optional(),
  })
  .passthrough();

const ErrorObjectSchema = z.object({
  error: z.union([z.string().min(1), ErrorDetailSchema]),
});

/**
 * Message for a top-level `error` member, built as `[code] (type) message`
 * from whichever fields are present. `undefined` when there is no error.
 */
export function describeErrorObject(json: unknown): string | undefined {
  const parsed = ErrorObjectSchema.safeParse(json);
  if (!parsed.success) return undefined;

  const { error } = parsed.data;
  if (typeof error === 'string') return error;

  const parts: string[] = [];
  if (error.code !== undefined && error.code !== null && error.code !== '') {
    parts.push(`[${error.code}]`);
  }
  const type = error.type ?? error.status;
  if (type) parts.push(`(${type})`);
  if (error.message) parts.push(error.message);
  return parts.length > 0 ? parts.join(' ') : 'Unknown error';
}

export function preview(body: string, limit = 500): string {
  return body.length > limit ? `${body.slice(0, limit)}...` : body;
}
