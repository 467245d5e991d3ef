import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildServer } from '../../src/server.js';
import { ConfigurationSchema } from '../../src/schemas/request.js';
import { LLMService } from '../../src/services/llm-service.js';
import type { HttpRequest } from '../../src/transport/types.js';
import { FakeTransport, createTestExecutor, httpError, ok, silentLogger, streamingResponder } from '../helpers.js';

const configuration = ConfigurationSchema.parse({
  provider: 'openai',
  providerSettings: {
    openai: { model: 'gpt-test', baseUrl: 'https://openai.example.test/v1/chat/completions', apiKey: 'test-secret' },
    openai_stream: {
      model: 'gpt-test',
      baseUrl: 'https://stream.example.test/v1/chat/completions',
      apiKey: 'test-secret',
      additionalParameters: { stream: true },
    },
    groq: { model: 'llama-test', baseUrl: 'https://groq.example.test/openai/v1/chat/completions', apiKey: 'test-secret' },
  },
});

const streamed = streamingResponder([
  'data: {"choices":[{"delta":{"content":"Hel"}}]}\n\n',
  'data: {"choices":[{"delta":{"content":"lo"}}]}\n\n',
  'data: [DONE]\n\n',
]);

const transport = new FakeTransport([
  (request: HttpRequest, options) => {
    if (request.url.startsWith('https://stream.example.test')) return streamed(request, options);
    if (request.url.startsWith('https://groq.example.test')) return httpError(429, 'rate limited');
    return ok('{"choices":[{"message":{"role":"assistant","content":"4"}}]}');
  },
]);

const messages = [
  { role: 'system', content: 'Be terse' },
  { role: 'user', content: '2+2?' },
];

describe('Query API Integration', () => {
  let server: Awaited<ReturnType<typeof buildServer>>;

  beforeAll(async () => {
    const service = new LLMService(configuration, { executor: createTestExecutor(transport), logger: silentLogger });
    server = await buildServer({ service });
    await server.ready();
  });

  afterAll(async () => {
    await server.close();
  });

  it('returns health check', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ok',
      defaultProvider: 'openai',
      providers: ['openai', 'openai_stream', 'groq'],
    });
  });

  it('answers a query with the provider text', async () => {
    const response = await server.inject({ method: 'POST', url: '/v1/query', payload: { messages } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ content: '4' });
    expect(response.headers['x-request-id']).toEqual(expect.any(String));
  });

  it('echoes a caller request id', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/query',
      headers: { 'x-request-id': 'req-123' },
      payload: { messages },
    });

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('rejects an invalid body', async () => {
    const response = await server.inject({ method: 'POST', url: '/v1/query', payload: { messages: [] } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'Validation error' });
  });

  it('maps provider failures to 502', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/query',
      payload: { provider: 'groq', messages },
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({ error: 'Groq API request failed with HTTP status 429', kind: 'http' });
  });

  it('maps configuration failures to 400', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/query',
      payload: { provider: 'missing', messages },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Provider "missing" is not configured', kind: 'configuration' });
  });

  it('streams chunks as server-sent events', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/query',
      payload: { provider: 'openai_stream', messages, stream: true },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/event-stream');
    expect(response.body).toBe(
      'data: {"chunk":"Hel"}\n\ndata: {"chunk":"lo"}\n\ndata: {"done":true}\n\n'
    );
  });

  it('sends a whole answer as one chunk when the profile does not stream', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/query',
      payload: { messages, stream: true },
    });

    expect(response.body).toBe('data: {"chunk":"4"}\n\ndata: {"done":true}\n\n');
  });

  it('ends a stream with an error event on failure', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/query',
      payload: { provider: 'groq', messages, stream: true },
    });

    expect(response.body).toBe(
      'data: {"error":"Groq API request failed with HTTP status 429","kind":"http"}\n\n'
    );
  });

  it('exposes Prometheus metrics', async () => {
    const response = await server.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.body).toContain('llm_dispatch_provider_outcomes_total');
  });
});
