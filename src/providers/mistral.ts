import { z } from 'zod';
import type { Message } from './base.js';
import { ChatCompletionsAdapter } from './openai-compatible.js';
import { describeErrorObject } from './shapes.js';

/** Mistral also reports errors as a bare top-level `message`. */
const MistralErrorSchema = z.object({
  message: z.string().min(1),
  type: z.string().nullable().optional(),
  code: z.union([z.string(), z.number()]).nullable().optional(),
});

export class MistralProvider extends ChatCompletionsAdapter {
  readonly name = 'mistral';
  readonly displayName = 'Mistral';

  protected extractError(json: unknown): string | undefined {
    const described = describeErrorObject(json);
    if (described !== undefined) return described;

    const parsed = MistralErrorSchema.safeParse(json);
    if (!parsed.success) return undefined;
    const { message, type, code } = parsed.data;
    const parts: string[] = [];
    if (code !== undefined && code !== null && code !== '') parts.push(`[${code}]`);
    if (type) parts.push(`(${type})`);
    parts.push(message);
    return parts.join(' ');
  }

  protected buildBody(messages: readonly Message[]): Record<string, unknown> {
    const params = this.settings.additionalParameters;
    return {
      model: this.settings.model,
      messages: messages.map(({ isContext: _internal, ...wire }) => wire),
      max_tokens: this.settings.maxTokens ?? params.max_tokens,
      temperature: this.settings.temperature ?? params.temperature,
      stream: params.stream === true ? true : undefined,
    };
  }
}
