import { CancelledError, TokenExchangeError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../middleware/logger.js';
import { trackTokenExchange } from '../middleware/metrics.js';
import { SingleFlight } from './single-flight.js';

export interface CachedToken {
  accessToken: string;
  /** Epoch milliseconds. */
  expiresAt: number;
}

export type TokenState = 'no-token' | 'exchanging' | 'valid' | 'expired';

export type TokenExchange = () => Promise<CachedToken>;

export const DEFAULT_TOKEN_LIFETIME_MS = 30 * 60 * 1000;

/** Absolute timestamps at or above this are already in milliseconds. */
const EPOCH_MS_THRESHOLD = 1e12;

/**
 * Normalize a provider expiry to epoch milliseconds. Absolute values may be
 * epoch seconds or epoch milliseconds; `expiresIn` is relative seconds.
 */
export function normalizeExpiry(
  source: { expiresAt?: number; expiresIn?: number },
  now: number,
  defaultLifetimeMs: number = DEFAULT_TOKEN_LIFETIME_MS
): number {
  const { expiresAt, expiresIn } = source;
  if (expiresAt !== undefined && Number.isFinite(expiresAt) && expiresAt > 0) {
    return expiresAt >= EPOCH_MS_THRESHOLD ? expiresAt : expiresAt * 1000;
  }
  if (expiresIn !== undefined && Number.isFinite(expiresIn) && expiresIn > 0) {
    return now + expiresIn * 1000;
  }
  return now + defaultLifetimeMs;
}

export interface TokenCacheOptions {
  provider?: string;
  now?: () => number;
  logger?: Logger;
}

const FLIGHT_KEY = 'token';

/**
 * Bearer token holder for one adapter instance. Refreshes lazily, with at
 * most one exchange in flight; concurrent callers share its result.
 */
export class TokenCache {
  private token?: CachedToken;
  private flight = new SingleFlight<string, CachedToken>();
  private exchange: TokenExchange;
  private provider: string;
  private now: () => number;
  private logger: Logger;

  constructor(exchange: TokenExchange, options: TokenCacheOptions = {}) {
    this.exchange = exchange;
    this.provider = options.provider ?? 'unknown';
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  get state(): TokenState {
    if (this.flight.isPending(FLIGHT_KEY)) return 'exchanging';
    if (!this.token) return 'no-token';
    return this.now() < this.token.expiresAt ? 'valid' : 'expired';
  }

  /**
   * An abort rejects this caller with CancelledError; the exchange itself
   * keeps running for the callers still waiting on it.
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new CancelledError();
    const cached = this.token;
    if (cached && this.now() < cached.expiresAt) {
      return cached.accessToken;
    }
    const flight = this.flight.execute(FLIGHT_KEY, () => this.refresh());
    const fresh = await (signal ? untilAborted(flight, signal) : flight);
    return fresh.accessToken;
  }

  invalidate(): void {
    this.token = undefined;
  }

  private async refresh(): Promise<CachedToken> {
    this.token = undefined;
    let token: CachedToken;
    try {
      token = await this.exchange();
    } catch (error) {
      trackTokenExchange(this.provider, 'failure');
      this.logger.warn(
        { provider: this.provider, error: error instanceof Error ? error.message : String(error) },
        'Token exchange failed'
      );
      throw error;
    }

    if (token.expiresAt <= this.now()) {
      trackTokenExchange(this.provider, 'failure');
      throw new TokenExchangeError('Exchanged token is already expired');
    }

    trackTokenExchange(this.provider, 'success');
    this.logger.debug({ provider: this.provider, expiresAt: token.expiresAt }, 'Token refreshed');
    this.token = token;
    return token;
  }
}

function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
