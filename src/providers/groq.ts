import type { Message } from './base.js';
import { ChatCompletionsAdapter } from './openai-compatible.js';

/** Request fields Groq accepts from `additionalParameters`. */
export const GROQ_PARAMETERS = [
  'temperature',
  'top_p',
  'max_completion_tokens',
  'max_tokens',
  'reasoning_effort',
  'reasoning_format',
  'search_settings',
  'stream',
] as const;

interface GroqMessage {
  role: Message['role'];
  content: string;
  name?: string;
  reasoning?: unknown;
}

export class GroqProvider extends ChatCompletionsAdapter {
  readonly name = 'groq';
  readonly displayName = 'Groq';

  protected buildBody(messages: readonly Message[]): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.settings.model,
      messages: messages.map((message) => {
        const wire: GroqMessage = { role: message.role, content: message.content };
        if (message.name !== undefined) wire.name = message.name;
        if (message.reasoning !== undefined) wire.reasoning = message.reasoning;
        return wire;
      }),
    };

    const params = this.settings.additionalParameters;
    for (const option of GROQ_PARAMETERS) {
      const value = params[option];
      if (value !== undefined && value !== null && value !== false) {
        body[option] = value;
      }
    }
    if (body.max_tokens === undefined && this.settings.maxTokens !== undefined) {
      body.max_tokens = this.settings.maxTokens;
    }
    if (body.temperature === undefined && this.settings.temperature !== undefined) {
      body.temperature = this.settings.temperature;
    }
    return body;
  }
}
