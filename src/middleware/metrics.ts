/**
 * Prometheus metrics for provider dispatch.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';

// Create a Registry to register metrics
const register = new client.Registry();

// HTTP request metrics
const httpRequestDuration = new client.Histogram({
  name: 'llm_dispatch_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

const providerLatency = new client.Histogram({
  name: 'llm_dispatch_provider_latency_seconds',
  help: 'Duration of provider requests in seconds, per attempt',
  labelNames: ['provider', 'transport', 'outcome'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 180, 500],
  registers: [register],
});

const providerOutcomes = new client.Counter({
  name: 'llm_dispatch_provider_outcomes_total',
  help: 'Request outcomes per provider',
  labelNames: ['provider', 'outcome'],
  registers: [register],
});

const retries = new client.Counter({
  name: 'llm_dispatch_retries_total',
  help: 'Automatic retries after connection failures',
  labelNames: ['provider'],
  registers: [register],
});

const tokenExchanges = new client.Counter({
  name: 'llm_dispatch_token_exchanges_total',
  help: 'Credential exchanges performed by token caches',
  labelNames: ['provider', 'result'],
  registers: [register],
});

const streamChunks = new client.Counter({
  name: 'llm_dispatch_stream_chunks_total',
  help: 'Decoded stream chunks delivered to callers',
  labelNames: ['provider'],
  registers: [register],
});

/**
 * Metrics middleware for Fastify.
 */
export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const route = request.routeOptions?.url || request.url;

    httpRequestDuration.observe(
      {
        method: request.method,
        route,
        status_code: reply.statusCode.toString(),
      },
      duration
    );
  });

  done();
}

export function trackProviderAttempt(
  provider: string,
  transport: string,
  outcome: string,
  durationSeconds: number
): void {
  providerLatency.observe({ provider, transport, outcome }, durationSeconds);
}

export function trackProviderOutcome(provider: string, outcome: string): void {
  providerOutcomes.inc({ provider, outcome });
}

export function trackRetry(provider: string): void {
  retries.inc({ provider });
}

export function trackTokenExchange(provider: string, result: 'success' | 'failure'): void {
  tokenExchanges.inc({ provider, result });
}

export function trackStreamChunk(provider: string): void {
  streamChunks.inc({ provider });
}

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}

export { register };
