import { z } from 'zod';

const GeminiChunkSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional(), thought: z.boolean().optional() })).optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

/** Each SSE event is a partial GenerateContentResponse; thought parts are skipped. */
export function extractGeminiDelta(payload: unknown): string | undefined {
  const parsed = GeminiChunkSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
  const text = parts
    .filter((part) => !part.thought)
    .map((part) => part.text ?? '')
    .join('');
  return text.length > 0 ? text : undefined;
}
