import { ConfigurationError, errorMessage } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { createProvider } from '../providers/index.js';
import type { CanonicalResult, LLMProvider, Message } from '../providers/base.js';
import type { Configuration } from '../schemas/request.js';
import type { BackgroundRunner } from './background-runner.js';
import type { RequestExecutor } from './request-executor.js';

export interface LLMServiceOptions {
  executor: RequestExecutor;
  runner?: BackgroundRunner;
  logger?: Logger;
}

export interface ServiceQueryOptions {
  /** Profile key in `providerSettings`; defaults to the configured provider. */
  provider?: string;
  onChunk?: (chunk: string) => void;
  signal?: AbortSignal;
}

/**
 * Host-facing entry point: picks the configured profile, builds its adapter
 * once and forwards the query. Always resolves to a CanonicalResult.
 */
export class LLMService {
  private configuration: Configuration;
  private options: LLMServiceOptions;
  private logger: Logger;
  private adapters = new Map<string, LLMProvider>();

  constructor(configuration: Configuration, options: LLMServiceOptions) {
    this.configuration = configuration;
    this.options = options;
    this.logger = options.logger ?? defaultLogger;
  }

  get defaultProvider(): string {
    return this.configuration.provider;
  }

  listProviders(): string[] {
    return Object.keys(this.configuration.providerSettings);
  }

  getProvider(profileKey: string = this.configuration.provider): LLMProvider {
    const cached = this.adapters.get(profileKey);
    if (cached) return cached;

    const settings = this.configuration.providerSettings[profileKey];
    if (!settings) {
      throw new ConfigurationError(`Provider "${profileKey}" is not configured`);
    }

    const adapter = createProvider(profileKey, settings, {
      executor: this.options.executor,
      runner: this.options.runner,
      logger: this.logger,
    });
    this.adapters.set(profileKey, adapter);
    return adapter;
  }

  async query(messages: readonly Message[], options: ServiceQueryOptions = {}): Promise<CanonicalResult> {
    const profileKey = options.provider ?? this.configuration.provider;

    let provider: LLMProvider;
    try {
      provider = this.getProvider(profileKey);
    } catch (error) {
      this.logger.warn({ provider: profileKey, error: errorMessage(error) }, 'Provider unavailable');
      return {
        success: false,
        kind: error instanceof ConfigurationError ? 'configuration' : 'internal',
        message: errorMessage(error),
      };
    }

    const startTime = Date.now();
    const result = await provider.query(messages, { onChunk: options.onChunk, signal: options.signal });
    this.logger.info(
      {
        provider: profileKey,
        handler: provider.name,
        messageCount: messages.length,
        success: result.success,
        kind: result.success ? undefined : result.kind,
        duration: Date.now() - startTime,
      },
      'Query finished'
    );
    return result;
  }
}
