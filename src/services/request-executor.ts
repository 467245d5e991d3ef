import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { trackProviderAttempt, trackProviderOutcome, trackRetry } from '../middleware/metrics.js';
import { redactUrl } from '../middleware/redact.js';
import { describeNetworkError } from '../transport/native.js';
import type { HttpRequest, RequestOutcome, TimeoutPolicy, Transport } from '../transport/types.js';
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, type RetryOptions } from './retry.js';

export const DEFAULT_TIMEOUTS: TimeoutPolicy = {
  connectTimeoutMs: 30_000,
  overallTimeoutMs: 60_000,
};

export const EXTENDED_TIMEOUTS: TimeoutPolicy = {
  connectTimeoutMs: 500_000,
  overallTimeoutMs: 500_000,
};

/** Bodies longer than this (in characters) get the extended budget. */
export const LARGE_REQUEST_THRESHOLD = 10_000;

export function selectTimeoutPolicy(
  body: string,
  base: TimeoutPolicy = DEFAULT_TIMEOUTS
): TimeoutPolicy {
  return body.length > LARGE_REQUEST_THRESHOLD ? EXTENDED_TIMEOUTS : base;
}

export interface RequestExecutorOptions {
  transport: Transport;
  retry?: RetryOptions;
  logger?: Logger;
  /** Label for logs and metrics. */
  provider?: string;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onData?: (chunk: string) => void;
}

export class RequestExecutor {
  readonly transport: Transport;
  private retry: RetryOptions;
  private logger: Logger;
  private provider: string;

  constructor(options: RequestExecutorOptions) {
    this.transport = options.transport;
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.logger = options.logger ?? defaultLogger;
    this.provider = options.provider ?? 'unknown';
  }

  /** Same transport and retry policy, different label. */
  forProvider(provider: string): RequestExecutor {
    return new RequestExecutor({
      transport: this.transport,
      retry: this.retry,
      logger: this.logger,
      provider,
    });
  }

  async execute(
    request: HttpRequest,
    policy: TimeoutPolicy,
    options: ExecuteOptions = {}
  ): Promise<RequestOutcome> {
    const { signal } = options;
    if (signal?.aborted) {
      trackProviderOutcome(this.provider, 'cancelled');
      return { kind: 'cancelled' };
    }

    let receivedData = false;
    const onData = options.onData
      ? (chunk: string) => {
          receivedData = true;
          options.onData?.(chunk);
        }
      : undefined;

    const outcome = await retryWithBackoff<RequestOutcome>(
      (attempt) => this.attempt(request, policy, attempt, signal, onData),
      {
        // Only connection failures are transient; a stream that already
        // delivered data cannot be replayed.
        shouldRetry: (result) =>
          result.kind === 'connection-error' && !receivedData && !signal?.aborted,
        onRetry: (result, attempt, delay) => {
          trackRetry(this.provider);
          this.logger.warn(
            {
              provider: this.provider,
              url: redactUrl(request.url),
              attempt,
              delay,
              detail: result.kind === 'connection-error' ? result.detail : undefined,
            },
            'Connection failed, retrying'
          );
        },
        signal,
      },
      this.retry
    );

    const final: RequestOutcome = signal?.aborted ? { kind: 'cancelled' } : outcome;
    trackProviderOutcome(this.provider, final.kind);
    return final;
  }

  private async attempt(
    request: HttpRequest,
    policy: TimeoutPolicy,
    attempt: number,
    signal: AbortSignal | undefined,
    onData: ((chunk: string) => void) | undefined
  ): Promise<RequestOutcome> {
    const startTime = Date.now();
    let outcome: RequestOutcome;
    try {
      outcome = await this.transport.send(request, { ...policy, signal, onData });
    } catch (error) {
      outcome = signal?.aborted
        ? { kind: 'cancelled' }
        : { kind: 'connection-error', detail: describeNetworkError(error) };
    }

    trackProviderAttempt(this.provider, this.transport.name, outcome.kind, (Date.now() - startTime) / 1000);
    this.logger.debug(
      { provider: this.provider, transport: this.transport.name, attempt, outcome: outcome.kind },
      'Request attempt finished'
    );
    return outcome;
  }
}
