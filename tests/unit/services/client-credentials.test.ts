import { describe, expect, it } from 'vitest';
import { TOKEN_EXCHANGE_TIMEOUTS, createClientCredentialsExchange } from '../../../src/services/client-credentials.js';
import { FakeTransport, connectionError, createTestExecutor, httpError, ok } from '../../helpers.js';

const AUTH_URL = 'https://auth.example.test/api/v2/oauth';

function exchangeWith(transport: FakeTransport) {
  return createClientCredentialsExchange(createTestExecutor(transport, 1), {
    authUrl: AUTH_URL,
    authorizationKey: 'test-auth-key',
    scope: 'GIGACHAT_API_PERS',
    now: () => 1000,
  });
}

describe('createClientCredentialsExchange', () => {
  it('posts the scope as a form with basic credentials', async () => {
    const transport = new FakeTransport([ok('{"access_token":"tok","expires_at":1700000000000}')]);

    await expect(exchangeWith(transport)()).resolves.toEqual({
      accessToken: 'tok',
      expiresAt: 1_700_000_000_000,
    });

    const call = transport.calls[0];
    expect(call?.request.url).toBe(AUTH_URL);
    expect(call?.request.body).toBe('scope=GIGACHAT_API_PERS');
    expect(call?.request.headers).toMatchObject({
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
      Authorization: 'Basic test-auth-key',
    });
    expect(call?.request.headers.RqUID).toMatch(/^[0-9a-f-]{36}$/);
    expect(call?.options.connectTimeoutMs).toBe(TOKEN_EXCHANGE_TIMEOUTS.connectTimeoutMs);
    expect(call?.options.overallTimeoutMs).toBe(TOKEN_EXCHANGE_TIMEOUTS.overallTimeoutMs);
  });

  it('turns a relative lifetime into an absolute expiry', async () => {
    const transport = new FakeTransport([ok('{"access_token":"tok","expires_in":60}')]);

    await expect(exchangeWith(transport)()).resolves.toEqual({ accessToken: 'tok', expiresAt: 61_000 });
  });

  it('reports HTTP failures with status and body', async () => {
    const transport = new FakeTransport([httpError(401, 'unauthorized')]);

    await expect(exchangeWith(transport)()).rejects.toThrow('Auth request failed (HTTP 401): unauthorized');
  });

  it('reports connection failures', async () => {
    const transport = new FakeTransport([connectionError('ECONNREFUSED')]);

    await expect(exchangeWith(transport)()).rejects.toThrow('Auth request failed: ECONNREFUSED');
  });

  it('rejects a body that is not JSON', async () => {
    const transport = new FakeTransport([ok('oops')]);

    await expect(exchangeWith(transport)()).rejects.toThrow('Failed to parse auth response: oops');
  });

  it('rejects a response without access_token', async () => {
    const transport = new FakeTransport([ok('{"expires_in":60}')]);

    await expect(exchangeWith(transport)()).rejects.toThrow('Auth response missing access_token');
  });
});
