import { z } from 'zod';

const TextDeltaSchema = z.object({
  type: z.literal('content_block_delta'),
  delta: z.object({
    type: z.literal('text_delta'),
    text: z.string(),
  }),
});

export function extractAnthropicDelta(payload: unknown): string | undefined {
  const parsed = TextDeltaSchema.safeParse(payload);
  return parsed.success ? parsed.data.delta.text : undefined;
}
