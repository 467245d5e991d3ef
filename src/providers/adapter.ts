import {
  CancelledError,
  ConfigurationError,
  ConnectionError,
  DispatchError,
  HttpError,
  ParseError,
  ProviderError,
  errorMessage,
} from '../errors.js';
import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { redactUrl } from '../middleware/redact.js';
import type { ProviderSettings } from '../schemas/request.js';
import { BackgroundRunner } from '../services/background-runner.js';
import {
  DEFAULT_TIMEOUTS,
  RequestExecutor,
  selectTimeoutPolicy,
} from '../services/request-executor.js';
import { assertNever, type RequestOutcome } from '../transport/types.js';
import type { CanonicalResult, LLMProvider, Message, ProviderRequest, QueryOptions } from './base.js';
import { describeErrorObject, preview, type ResponseShape } from './shapes.js';
import { createStreamDecoder, type ProviderStreamDecoder } from './stream-parsers/index.js';

export interface AdapterDependencies {
  executor: RequestExecutor;
  runner?: BackgroundRunner;
  logger?: Logger;
}

const failure = (kind: DispatchError['kind'], message: string): CanonicalResult => ({
  success: false,
  kind,
  message,
});

/**
 * One provider variant: subclasses say how to build the request and which
 * response shapes carry text; dispatch, outcome mapping and error
 * containment live here. `query` never throws.
 */
export abstract class ProviderAdapter implements LLMProvider {
  abstract readonly name: string;
  abstract readonly displayName: string;

  /** Success shapes, tried in order after the error check. */
  protected abstract readonly successShapes: readonly ResponseShape[];

  protected readonly settings: ProviderSettings;
  protected readonly logger: Logger;
  private readonly baseExecutor: RequestExecutor;
  private readonly baseRunner?: BackgroundRunner;
  private scopedExecutor?: RequestExecutor;
  private scopedRunner?: BackgroundRunner;

  constructor(settings: ProviderSettings, deps: AdapterDependencies) {
    this.settings = settings;
    this.baseExecutor = deps.executor;
    this.baseRunner = deps.runner;
    this.logger = deps.logger ?? defaultLogger;
  }

  protected get executor(): RequestExecutor {
    this.scopedExecutor ??= this.baseExecutor.forProvider(this.name);
    return this.scopedExecutor;
  }

  protected get runner(): BackgroundRunner {
    this.scopedRunner ??= this.baseRunner ?? new BackgroundRunner({ logger: this.logger, provider: this.name });
    return this.scopedRunner;
  }

  /** `signal` covers any async work done before dispatch, such as fetching a token. */
  protected abstract buildRequest(
    messages: readonly Message[],
    signal?: AbortSignal
  ): Promise<ProviderRequest> | ProviderRequest;

  /** Throws ConfigurationError before any network call. */
  protected validateSettings(): void {
    if (!this.settings.model) {
      throw new ConfigurationError(`Missing model for ${this.displayName}`);
    }
    if (!this.settings.baseUrl) {
      throw new ConfigurationError(`Missing base URL for ${this.displayName}`);
    }
    if (!this.settings.apiKey) {
      throw new ConfigurationError(`Missing API key for ${this.displayName}`);
    }
  }

  protected get streamRequested(): boolean {
    return this.settings.additionalParameters.stream === true;
  }

  /** Provider error message carried by a decoded body, if any. */
  protected extractError(json: unknown): string | undefined {
    return describeErrorObject(json);
  }

  async query(messages: readonly Message[], options: QueryOptions = {}): Promise<CanonicalResult> {
    try {
      this.validateSettings();
      const request = await this.buildRequest(messages, options.signal);
      return await this.dispatch(request, options);
    } catch (error) {
      return this.toFailure(error);
    }
  }

  parseResponse(body: string): string {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new ParseError(`Could not interpret ${this.displayName} API response`, body);
    }

    const providerError = this.extractError(json);
    if (providerError !== undefined) {
      throw new ProviderError(`${this.displayName} API error: ${providerError}`);
    }

    for (const candidate of this.successShapes) {
      const text = candidate(json);
      if (text !== undefined) return text;
    }

    throw new ParseError(`Unexpected response shape from ${this.displayName} API: ${preview(body)}`, body);
  }

  describeHttpError(status: number, body: string): string {
    let detail: string | undefined;
    try {
      detail = this.extractError(JSON.parse(body));
    } catch {
      detail = undefined;
    }
    return detail !== undefined
      ? `${this.displayName} API returned HTTP ${status} - ${detail}`
      : `${this.displayName} API request failed with HTTP status ${status}`;
  }

  private async dispatch(request: ProviderRequest, options: QueryOptions): Promise<CanonicalResult> {
    const { url, headers, body } = request;
    const policy = this.settings.timeouts ?? selectTimeoutPolicy(body, request.timeouts ?? DEFAULT_TIMEOUTS);

    if (!request.stream) {
      const outcome = await this.executor.execute({ url, headers, body }, policy, { signal: options.signal });
      return { success: true, text: this.interpret(outcome) };
    }

    const decoder = createStreamDecoder(request.stream);
    let streamed = '';
    const task = this.runner.run(
      (signal, onData) => this.executor.execute({ url, headers, body }, policy, { signal, onData }),
      {
        decoder,
        signal: options.signal,
        onChunk: (chunk) => {
          streamed += chunk;
          options.onChunk?.(chunk);
        },
      }
    );
    const outcome = await task.result;
    return { success: true, text: this.interpret(outcome, { decoder, streamed }) };
  }

  /** Text for a successful outcome; every other outcome throws its DispatchError. */
  private interpret(
    outcome: RequestOutcome,
    stream?: { decoder: ProviderStreamDecoder; streamed: string }
  ): string {
    switch (outcome.kind) {
      case 'success':
        if (stream?.decoder.error !== undefined) {
          throw new ProviderError(`${this.displayName} API error: ${stream.decoder.error}`);
        }
        if (stream && stream.streamed.length > 0) {
          return stream.streamed;
        }
        return this.parseResponse(outcome.body);
      case 'http-error':
        throw new HttpError(this.describeHttpError(outcome.status, outcome.body), outcome.status, outcome.body);
      case 'connection-error':
        throw new ConnectionError(`Failed to connect to ${this.displayName} API - ${outcome.detail}`, outcome.detail);
      case 'cancelled':
        throw new CancelledError();
      default:
        return assertNever(outcome);
    }
  }

  private toFailure(error: unknown): CanonicalResult {
    if (error instanceof ParseError) {
      this.logger.warn({ provider: this.name, body: preview(error.body, 2000) }, 'Could not parse provider response');
      return failure(error.kind, error.message);
    }
    if (error instanceof HttpError) {
      this.logger.warn(
        { provider: this.name, status: error.status, body: preview(error.body), url: redactUrl(this.settings.baseUrl) },
        'Provider returned HTTP error'
      );
      return failure(error.kind, error.message);
    }
    if (error instanceof DispatchError) {
      if (error.kind !== 'configuration' && error.kind !== 'cancelled') {
        this.logger.warn({ provider: this.name, kind: error.kind, error: error.message }, 'Provider request failed');
      }
      return failure(error.kind, error.message);
    }
    this.logger.error({ provider: this.name, error: errorMessage(error) }, 'Unexpected adapter failure');
    return failure('internal', `Error: ${errorMessage(error)}`);
  }
}
