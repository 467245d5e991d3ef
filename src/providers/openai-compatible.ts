import type OpenAI from 'openai';
import { z } from 'zod';
import { ProviderAdapter } from './adapter.js';
import type { Message, ProviderRequest } from './base.js';
import { shape, type ResponseShape } from './shapes.js';

const ChatMessageResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

const ChatTextResponseSchema = z.object({
  choices: z.array(z.object({ text: z.string() })).min(1),
});

/** `choices[0].message.content` */
export const chatMessageShape: ResponseShape = shape(
  ChatMessageResponseSchema,
  (response) => response.choices[0]?.message.content
);

/** Legacy completions: `choices[0].text` */
export const chatTextShape: ResponseShape = shape(ChatTextResponseSchema, (response) => response.choices[0]?.text);

/**
 * Canonical messages → Chat Completions messages. Builds fresh objects with
 * only the wire fields, so host-only markers never leave the process.
 */
export function toChatMessages(messages: readonly Message[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    const name = message.name === undefined ? {} : { name: message.name };
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content, ...name };
      case 'user':
        return { role: 'user', content: message.content, ...name };
      case 'assistant':
        return { role: 'assistant', content: message.content, ...name };
    }
  });
}

/**
 * Shared base for providers speaking the Chat Completions dialect:
 * POST JSON to the configured URL, Bearer auth, `openai-sse` streaming.
 */
export abstract class ChatCompletionsAdapter extends ProviderAdapter {
  protected readonly successShapes: readonly ResponseShape[] = [chatMessageShape];

  protected abstract buildBody(messages: readonly Message[]): Record<string, unknown>;

  protected async authHeaders(_signal?: AbortSignal): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${this.settings.apiKey ?? ''}` };
  }

  protected extraHeaders(): Record<string, string> {
    return {};
  }

  protected async buildRequest(messages: readonly Message[], signal?: AbortSignal): Promise<ProviderRequest> {
    const body = this.buildBody(messages);
    const stream = body.stream === true;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...(await this.authHeaders(signal)),
      ...this.extraHeaders(),
    };
    if (stream) {
      headers.Accept = 'text/event-stream';
    }

    return {
      url: this.settings.baseUrl,
      headers,
      body: JSON.stringify(body),
      stream: stream ? 'openai-sse' : undefined,
    };
  }
}
