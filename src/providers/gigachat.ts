import { randomUUID } from 'node:crypto';
import { CancelledError, ConfigurationError, TokenExchangeError, errorMessage } from '../errors.js';
import type { ProviderSettings } from '../schemas/request.js';
import { createClientCredentialsExchange } from '../services/client-credentials.js';
import { TokenCache } from '../services/token-cache.js';
import type { AdapterDependencies } from './adapter.js';
import type { Message, ProviderRequest } from './base.js';
import { ChatCompletionsAdapter, toChatMessages } from './openai-compatible.js';

export const DEFAULT_GIGACHAT_SCOPE = 'GIGACHAT_API_PERS';
export const DEFAULT_UPDATE_INTERVAL = 3;

const GIGACHAT_TIMEOUTS = { connectTimeoutMs: 45_000, overallTimeoutMs: 90_000 };

/**
 * GigaChat: Chat Completions body, but the bearer token comes from an OAuth
 * client-credentials exchange against `authUrl`. `apiKey` holds the
 * authorization key for that exchange.
 */
export class GigaChatProvider extends ChatCompletionsAdapter {
  readonly name = 'gigachat';
  readonly displayName = 'GigaChat';
  private tokens?: TokenCache;

  constructor(settings: ProviderSettings, deps: AdapterDependencies, tokens?: TokenCache) {
    super(settings, deps);
    this.tokens = tokens;
  }

  protected validateSettings(): void {
    super.validateSettings();
    if (!this.settings.authUrl) {
      throw new ConfigurationError(`Missing auth URL for ${this.displayName}`);
    }
  }

  get tokenCache(): TokenCache {
    this.tokens ??= new TokenCache(
      createClientCredentialsExchange(this.executor, {
        authUrl: this.settings.authUrl ?? '',
        authorizationKey: this.settings.apiKey ?? '',
        scope: this.settings.scope ?? DEFAULT_GIGACHAT_SCOPE,
      }),
      { provider: this.name, logger: this.logger }
    );
    return this.tokens;
  }

  protected async authHeaders(signal?: AbortSignal): Promise<Record<string, string>> {
    let token: string;
    try {
      token = await this.tokenCache.getToken(signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      throw new TokenExchangeError(`Error obtaining access token: ${errorMessage(error)}`, { cause: error });
    }
    return { Authorization: `Bearer ${token}`, RqUID: randomUUID() };
  }

  protected buildBody(messages: readonly Message[]): Record<string, unknown> {
    const params = this.settings.additionalParameters;
    return {
      model: this.settings.model,
      messages: toChatMessages(messages),
      stream: params.stream === true,
      update_interval: typeof params.update_interval === 'number' ? params.update_interval : DEFAULT_UPDATE_INTERVAL,
      max_tokens: this.settings.maxTokens ?? params.max_tokens,
    };
  }

  protected async buildRequest(messages: readonly Message[], signal?: AbortSignal): Promise<ProviderRequest> {
    const request = await super.buildRequest(messages, signal);
    return { ...request, timeouts: GIGACHAT_TIMEOUTS };
  }
}
