import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { CancelledError, TokenExchangeError } from '../errors.js';
import { assertNever, type TimeoutPolicy } from '../transport/types.js';
import type { RequestExecutor } from './request-executor.js';
import { normalizeExpiry, DEFAULT_TOKEN_LIFETIME_MS, type TokenExchange } from './token-cache.js';

export const TOKEN_EXCHANGE_TIMEOUTS: TimeoutPolicy = {
  connectTimeoutMs: 20_000,
  overallTimeoutMs: 45_000,
};

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.number().optional(),
  expires_in: z.number().optional(),
});

export interface ClientCredentialsSettings {
  authUrl: string;
  /** Pre-encoded client credentials sent as `Authorization: Basic <key>`. */
  authorizationKey: string;
  scope: string;
  now?: () => number;
  defaultLifetimeMs?: number;
}

const preview = (body: string): string => (body.length > 300 ? `${body.slice(0, 300)}...` : body);

export function createClientCredentialsExchange(
  executor: RequestExecutor,
  settings: ClientCredentialsSettings
): TokenExchange {
  const now = settings.now ?? Date.now;

  return async () => {
    const outcome = await executor.execute(
      {
        url: settings.authUrl,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
          Authorization: `Basic ${settings.authorizationKey}`,
          RqUID: randomUUID(),
        },
        body: new URLSearchParams({ scope: settings.scope }).toString(),
      },
      TOKEN_EXCHANGE_TIMEOUTS
    );

    switch (outcome.kind) {
      case 'success':
        break;
      case 'http-error':
        throw new TokenExchangeError(`Auth request failed (HTTP ${outcome.status}): ${preview(outcome.body)}`);
      case 'connection-error':
        throw new TokenExchangeError(`Auth request failed: ${outcome.detail}`);
      case 'cancelled':
        throw new CancelledError();
      default:
        return assertNever(outcome);
    }

    let json: unknown;
    try {
      json = JSON.parse(outcome.body);
    } catch (error) {
      throw new TokenExchangeError(`Failed to parse auth response: ${preview(outcome.body)}`, { cause: error });
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TokenExchangeError('Auth response missing access_token');
    }

    return {
      accessToken: parsed.data.access_token,
      expiresAt: normalizeExpiry(
        { expiresAt: parsed.data.expires_at, expiresIn: parsed.data.expires_in },
        now(),
        settings.defaultLifetimeMs ?? DEFAULT_TOKEN_LIFETIME_MS
      ),
    };
  };
}
