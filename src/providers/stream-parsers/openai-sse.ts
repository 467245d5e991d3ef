import { z } from 'zod';

const ChatCompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullable().optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

/** Chat Completions stream: `choices[0].delta.content`. */
export function extractOpenAIDelta(payload: unknown): string | undefined {
  const parsed = ChatCompletionChunkSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  return parsed.data.choices?.[0]?.delta?.content ?? undefined;
}
