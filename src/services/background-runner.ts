import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { trackStreamChunk } from '../middleware/metrics.js';
import { describeNetworkError } from '../transport/native.js';
import type { RequestOutcome } from '../transport/types.js';

/**
 * Turns raw response text into content fragments. `push` may be called with
 * arbitrary slices of the stream; `end` flushes whatever is still buffered.
 */
export interface StreamDecoder {
  push(text: string): string[];
  end(): string[];
}

export type BackgroundRequest = (
  signal: AbortSignal,
  onData: (chunk: string) => void
) => Promise<RequestOutcome>;

export interface RunOptions {
  onChunk?: (chunk: string) => void;
  decoder?: StreamDecoder;
  /** Aborting this signal is the same as calling `cancel()`. */
  signal?: AbortSignal;
}

export interface BackgroundTask {
  /** Always resolves; never rejects. */
  readonly result: Promise<RequestOutcome>;
  readonly cancelled: boolean;
  /** Idempotent. */
  cancel(): void;
}

export interface BackgroundRunnerOptions {
  logger?: Logger;
  provider?: string;
}

export class BackgroundRunner {
  private logger: Logger;
  private provider: string;

  constructor(options: BackgroundRunnerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.provider = options.provider ?? 'unknown';
  }

  run(requestFn: BackgroundRequest, options: RunOptions = {}): BackgroundTask {
    const controller = new AbortController();
    let cancelled = false;

    const cancel = () => {
      if (cancelled) return;
      cancelled = true;
      this.logger.debug({ provider: this.provider }, 'Background request cancelled');
      controller.abort();
    };

    if (options.signal?.aborted) {
      cancel();
    } else {
      options.signal?.addEventListener('abort', cancel, { once: true });
    }

    const deliver = (fragments: string[]) => {
      for (const fragment of fragments) {
        if (cancelled) return;
        if (fragment.length === 0) continue;
        trackStreamChunk(this.provider);
        options.onChunk?.(fragment);
      }
    };

    const onData = (data: string) => {
      if (cancelled) return;
      deliver(options.decoder ? options.decoder.push(data) : [data]);
    };

    const settle = (outcome: RequestOutcome): RequestOutcome => {
      if (cancelled) return { kind: 'cancelled' };
      if (outcome.kind === 'success' && options.decoder) {
        deliver(options.decoder.end());
      }
      return cancelled ? { kind: 'cancelled' } : outcome;
    };

    const result = new Promise<RequestOutcome>((resolve) => {
      setImmediate(() => {
        if (cancelled) {
          resolve({ kind: 'cancelled' });
          return;
        }

        let pending: Promise<RequestOutcome>;
        try {
          pending = requestFn(controller.signal, onData);
        } catch (error) {
          this.logger.warn({ provider: this.provider, error: describeNetworkError(error) }, 'Background request failed to start');
          resolve({
            kind: 'connection-error',
            detail: `Failed to start background request: ${describeNetworkError(error)}`,
          });
          return;
        }

        pending.then(
          (outcome) => {
            try {
              resolve(settle(outcome));
            } catch (error) {
              resolve({ kind: 'connection-error', detail: describeNetworkError(error) });
            }
          },
          (error: unknown) =>
            resolve(
              cancelled
                ? { kind: 'cancelled' }
                : { kind: 'connection-error', detail: describeNetworkError(error) }
            )
        );
      });
    }).finally(() => {
      options.signal?.removeEventListener('abort', cancel);
    });

    return {
      result,
      cancel,
      get cancelled() {
        return cancelled;
      },
    };
  }
}
