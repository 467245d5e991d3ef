import Fastify from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { loadConfig, type AppConfig } from './config.js';
import { DispatchError } from './errors.js';
import { logger } from './middleware/logger.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';
import { queryRoutes, statusForKind } from './routes/query.js';
import { LLMService } from './services/llm-service.js';
import { RequestExecutor } from './services/request-executor.js';
import { DEFAULT_RETRY_OPTIONS } from './services/retry.js';
import { createTransport } from './transport/index.js';

export interface BuildServerOptions {
  config?: AppConfig;
  /** Replaces the service built from `config`. */
  service?: LLMService;
}

export function createService(config: AppConfig): LLMService {
  if (!config.LLM_PROVIDERS) {
    throw new DispatchError('configuration', 'LLM_PROVIDERS is not set');
  }

  const transport = createTransport({ mode: config.LLM_TRANSPORT, curlPath: config.LLM_CURL_PATH, logger });
  const executor = new RequestExecutor({
    transport,
    logger,
    retry: {
      ...DEFAULT_RETRY_OPTIONS,
      maxAttempts: config.LLM_RETRY_ATTEMPTS,
      initialDelay: config.LLM_RETRY_DELAY_MS,
      maxDelay: config.LLM_RETRY_DELAY_MS,
    },
  });
  return new LLMService(config.LLM_PROVIDERS, { executor, logger });
}

async function buildServer(options: BuildServerOptions = {}) {
  const service = options.service ?? createService(options.config ?? loadConfig());

  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
  });

  await server.register(cors);

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  await server.register((instance) => healthRoutes(instance, service));
  await server.register(metricsRoutes);
  await server.register((instance) => queryRoutes(instance, service));

  server.setErrorHandler((error, request, reply) => {
    logger.error(
      {
        requestId: request.id,
        error: error.message,
        stack: error.stack,
      },
      'Request error'
    );

    if (error instanceof ZodError) {
      reply.code(400).send({
        error: 'Validation error',
        kind: 'configuration',
        details: error.errors,
      });
      return;
    }

    if (error instanceof DispatchError) {
      reply.code(statusForKind(error.kind)).send({ error: error.message, kind: error.kind });
      return;
    }

    reply.code(error.statusCode ?? 500).send({
      error: error.statusCode ? error.message : 'Internal server error',
      kind: 'internal',
      requestId: request.id,
    });
  });

  return server;
}

async function main() {
  const config = loadConfig();
  const server = await buildServer({ config });

  logger.info({ port: config.PORT, host: config.HOST, transport: config.LLM_TRANSPORT }, 'Starting server');

  try {
    await server.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err: unknown) => {
    logger.fatal({ error: err }, 'Startup failed');
    process.exit(1);
  });
}

export { buildServer };
