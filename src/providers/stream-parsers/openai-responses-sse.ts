import { z } from 'zod';

const OutputTextDeltaSchema = z.object({
  type: z.literal('response.output_text.delta'),
  delta: z.string(),
});

/** Responses API stream: only `response.output_text.delta` events carry text. */
export function extractResponsesDelta(payload: unknown): string | undefined {
  const parsed = OutputTextDeltaSchema.safeParse(payload);
  return parsed.success ? parsed.data.delta : undefined;
}
