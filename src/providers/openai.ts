import type OpenAI from 'openai';
import { z } from 'zod';
import type { ProviderSettings } from '../schemas/request.js';
import type { AdapterDependencies } from './adapter.js';
import type { Message, ProviderRequest } from './base.js';
import { ChatCompletionsAdapter, chatMessageShape, chatTextShape, toChatMessages } from './openai-compatible.js';
import { shape, type ResponseShape } from './shapes.js';

/** Chat Completions parameters the Responses API rejects. */
const RESPONSES_DROPPED_PARAMETERS = new Set([
  'messages',
  'n',
  'logprobs',
  'logit_bias',
  'presence_penalty',
  'frequency_penalty',
]);

const WEB_SEARCH_TIMEOUTS = { connectTimeoutMs: 60_000, overallTimeoutMs: 180_000 };

const OutputTextSchema = z.object({ output_text: z.string() });

const OutputItemsSchema = z.object({
  output: z.array(
    z
      .object({
        text: z.string().nullable().optional(),
        content: z
          .array(z.object({ text: z.string().nullable().optional() }).passthrough())
          .nullable()
          .optional(),
      })
      .passthrough()
  ),
});

export const responsesShapes: readonly ResponseShape[] = [
  shape(OutputTextSchema, (response) => response.output_text),
  shape(OutputItemsSchema, (response) => {
    for (const item of response.output) {
      if (item.text) return item.text;
      for (const part of item.content ?? []) {
        if (part.text) return part.text;
      }
    }
    return undefined;
  }),
];

export function usesResponsesApi(baseUrl: string): boolean {
  return baseUrl.includes('/responses');
}

/**
 * OpenAI and OpenAI-hosted lookalikes. The endpoint decides the dialect:
 * a `/responses` URL gets the Responses API, anything else Chat Completions.
 */
export class OpenAIProvider extends ChatCompletionsAdapter {
  readonly name = 'openai';
  readonly displayName = 'OpenAI';
  protected readonly successShapes: readonly ResponseShape[];
  private readonly responsesApi: boolean;

  constructor(settings: ProviderSettings, deps: AdapterDependencies) {
    super(settings, deps);
    this.responsesApi = usesResponsesApi(settings.baseUrl);
    this.successShapes = this.responsesApi ? responsesShapes : [chatMessageShape, chatTextShape];
  }

  protected buildBody(messages: readonly Message[]): Record<string, unknown> {
    return this.responsesApi ? this.buildResponsesBody(messages) : this.buildChatBody(messages);
  }

  protected async buildRequest(messages: readonly Message[], signal?: AbortSignal): Promise<ProviderRequest> {
    const request = await super.buildRequest(messages, signal);
    if (!this.responsesApi) return request;

    return {
      ...request,
      stream: request.stream ? 'openai-responses-sse' : undefined,
      timeouts: this.settings.enableWebSearch ? WEB_SEARCH_TIMEOUTS : undefined,
    };
  }

  private buildChatBody(messages: readonly Message[]): Record<string, unknown> {
    const core: OpenAI.Chat.ChatCompletionCreateParams = {
      model: this.settings.model,
      messages: toChatMessages(messages),
      max_tokens: this.settings.maxTokens,
      temperature: this.settings.temperature,
    };
    return { ...core, ...this.settings.additionalParameters };
  }

  private buildResponsesBody(messages: readonly Message[]): Record<string, unknown> {
    const input = messages
      .filter((message) => message.role !== 'system')
      .map((message) => ({ role: message.role, content: message.content }));

    const body: Record<string, unknown> = {
      model: this.settings.model,
      input: input.length > 0 ? input : messages.at(-1)?.content ?? '',
    };

    const first = messages[0];
    if (first?.role === 'system') {
      body.instructions = first.content;
    }

    for (const [key, value] of Object.entries(this.settings.additionalParameters)) {
      if (key === 'max_tokens') {
        body.max_output_tokens = value;
      } else if (!RESPONSES_DROPPED_PARAMETERS.has(key)) {
        body[key] = value;
      }
    }

    if (this.settings.maxTokens !== undefined && body.max_output_tokens === undefined) {
      body.max_output_tokens = this.settings.maxTokens;
    }
    if (this.settings.temperature !== undefined && body.temperature === undefined) {
      body.temperature = this.settings.temperature;
    }

    if (this.settings.enableWebSearch) {
      const tools: unknown[] = Array.isArray(body.tools) ? [...body.tools] : [];
      const hasWebSearch = tools.some(
        (tool: unknown) => typeof tool === 'object' && tool !== null && 'type' in tool && tool.type === 'web_search'
      );
      if (!hasWebSearch) {
        tools.push({ type: 'web_search' });
      }
      body.tools = tools;
    }

    return body;
  }
}
