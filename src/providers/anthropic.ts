import type Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ProviderAdapter } from './adapter.js';
import type { Message, ProviderRequest } from './base.js';
import { describeErrorObject, shape, type ResponseShape } from './shapes.js';

export const DEFAULT_ANTHROPIC_VERSION = '2023-06-01';
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 4096;

const ContentBlocksSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).min(1),
});

const LegacyCompletionSchema = z.object({ completion: z.string() });

/** Validation failures come back as `{ type, detail }` without an `error` member. */
const ValidationErrorSchema = z.object({ type: z.string(), detail: z.string() });

export class AnthropicProvider extends ProviderAdapter {
  readonly name = 'anthropic';
  readonly displayName = 'Anthropic';

  protected readonly successShapes: readonly ResponseShape[] = [
    shape(ContentBlocksSchema, (response) =>
      response.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('')
    ),
    shape(LegacyCompletionSchema, (response) => response.completion),
  ];

  protected extractError(json: unknown): string | undefined {
    const described = describeErrorObject(json);
    if (described !== undefined) return described;
    const validation = ValidationErrorSchema.safeParse(json);
    return validation.success ? `(${validation.data.type}) ${validation.data.detail}` : undefined;
  }

  protected buildRequest(messages: readonly Message[]): ProviderRequest {
    const {
      anthropic_version: version,
      max_tokens: maxTokens,
      temperature,
      ...extra
    } = this.settings.additionalParameters;

    const system = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');

    const conversation: Anthropic.MessageParam[] = messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'assistant' ? 'assistant' : 'user',
        content: message.content,
      }));

    const core: Anthropic.MessageCreateParams = {
      model: this.settings.model,
      max_tokens:
        this.settings.maxTokens ?? (typeof maxTokens === 'number' ? maxTokens : DEFAULT_ANTHROPIC_MAX_TOKENS),
      messages: conversation,
      temperature: this.settings.temperature ?? (typeof temperature === 'number' ? temperature : undefined),
    };
    if (system.length > 0) {
      core.system = system;
    }

    const stream = this.streamRequested;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'x-api-key': this.settings.apiKey ?? '',
      'anthropic-version': typeof version === 'string' ? version : DEFAULT_ANTHROPIC_VERSION,
    };
    if (stream) {
      headers.Accept = 'text/event-stream';
    }

    return {
      url: this.settings.baseUrl,
      headers,
      body: JSON.stringify({ ...extra, ...core }),
      stream: stream ? 'anthropic-sse' : undefined,
    };
  }
}
