import { ConfigurationError } from '../errors.js';
import { ProviderKindSchema, type ProviderKind, type ProviderSettings } from '../schemas/request.js';
import type { AdapterDependencies, ProviderAdapter } from './adapter.js';
import { AnthropicProvider } from './anthropic.js';
import { DeepSeekProvider } from './deepseek.js';
import { GeminiProvider } from './gemini.js';
import { GigaChatProvider } from './gigachat.js';
import { GroqProvider } from './groq.js';
import { MistralProvider } from './mistral.js';
import { OpenAIProvider } from './openai.js';
import { OpenRouterProvider } from './openrouter.js';

export {
  AnthropicProvider,
  DeepSeekProvider,
  GeminiProvider,
  GigaChatProvider,
  GroqProvider,
  MistralProvider,
  OpenAIProvider,
  OpenRouterProvider,
};
export { ProviderAdapter, type AdapterDependencies } from './adapter.js';
export type { CanonicalResult, LLMProvider, Message, ProviderRequest, QueryOptions, Role } from './base.js';

type AdapterFactory = (settings: ProviderSettings, deps: AdapterDependencies) => ProviderAdapter;

const factories: Record<ProviderKind, AdapterFactory> = {
  openai: (settings, deps) => new OpenAIProvider(settings, deps),
  anthropic: (settings, deps) => new AnthropicProvider(settings, deps),
  gemini: (settings, deps) => new GeminiProvider(settings, deps),
  gigachat: (settings, deps) => new GigaChatProvider(settings, deps),
  groq: (settings, deps) => new GroqProvider(settings, deps),
  mistral: (settings, deps) => new MistralProvider(settings, deps),
  openrouter: (settings, deps) => new OpenRouterProvider(settings, deps),
  deepseek: (settings, deps) => new DeepSeekProvider(settings, deps),
};

/**
 * Adapter kind for a profile: the explicit `handler`, else the profile key
 * up to the first `_` (`openai_grok` → `openai`).
 */
export function resolveHandler(profileKey: string, settings: ProviderSettings): ProviderKind {
  if (settings.handler) return settings.handler;

  const prefix = profileKey.split('_')[0] ?? profileKey;
  const parsed = ProviderKindSchema.safeParse(prefix);
  if (!parsed.success) {
    throw new ConfigurationError(`No handler for provider profile "${profileKey}"`);
  }
  return parsed.data;
}

export function createProvider(
  profileKey: string,
  settings: ProviderSettings,
  deps: AdapterDependencies
): ProviderAdapter {
  return factories[resolveHandler(profileKey, settings)](settings, deps);
}
