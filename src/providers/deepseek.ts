import type { Message } from './base.js';
import { ChatCompletionsAdapter, toChatMessages } from './openai-compatible.js';

export class DeepSeekProvider extends ChatCompletionsAdapter {
  readonly name = 'deepseek';
  readonly displayName = 'DeepSeek';

  protected buildBody(messages: readonly Message[]): Record<string, unknown> {
    const params = this.settings.additionalParameters;
    return {
      model: this.settings.model,
      messages: toChatMessages(messages),
      max_tokens: params.max_tokens ?? this.settings.maxTokens,
      temperature: this.settings.temperature,
      stream: params.stream === true ? true : undefined,
    };
  }
}
