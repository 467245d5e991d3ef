import type { Message } from './base.js';
import { ChatCompletionsAdapter, toChatMessages } from './openai-compatible.js';

export const OPENROUTER_REFERER = 'https://github.com/llm-dispatch/llm-dispatch';
export const OPENROUTER_TITLE = 'llm-dispatch';

export class OpenRouterProvider extends ChatCompletionsAdapter {
  readonly name = 'openrouter';
  readonly displayName = 'OpenRouter';

  protected extraHeaders(): Record<string, string> {
    return { 'HTTP-Referer': OPENROUTER_REFERER, 'X-Title': OPENROUTER_TITLE };
  }

  protected buildBody(messages: readonly Message[]): Record<string, unknown> {
    const params = this.settings.additionalParameters;
    const body: Record<string, unknown> = {
      model: this.settings.model,
      messages: toChatMessages(messages),
      max_tokens: this.settings.maxTokens ?? params.max_tokens,
      temperature: this.settings.temperature ?? params.temperature,
      stream: params.stream === true,
    };

    // Reasoning tokens are left out of the reply unless asked for.
    const { reasoning } = params;
    if (typeof reasoning === 'object' && reasoning !== null && !Array.isArray(reasoning)) {
      body.reasoning = { exclude: true, ...reasoning };
    }
    return body;
  }
}
