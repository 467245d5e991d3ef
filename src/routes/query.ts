import type { FastifyInstance, FastifyReply } from 'fastify';
import type { ErrorKind } from '../errors.js';
import { logger } from '../middleware/logger.js';
import type { CanonicalResult } from '../providers/base.js';
import { QueryRequestSchema, type QueryRequest } from '../schemas/request.js';
import type { LLMService } from '../services/llm-service.js';

/** Non-standard "client closed request". */
export const STATUS_CLIENT_CLOSED = 499;

export function statusForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'configuration':
      return 400;
    case 'cancelled':
      return STATUS_CLIENT_CLOSED;
    default:
      return 502;
  }
}

/** Aborts when the client goes away before the reply is complete. */
function abortOnDisconnect(reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller;
}

function sseEvent(payload: Record<string, unknown>): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

export async function queryRoutes(app: FastifyInstance, service: LLMService): Promise<void> {
  app.post('/v1/query', async (request, reply) => {
    const body = QueryRequestSchema.parse(request.body);

    logger.info(
      {
        requestId: request.id,
        provider: body.provider ?? service.defaultProvider,
        messageCount: body.messages.length,
        stream: body.stream,
      },
      'Query request'
    );

    if (body.stream) {
      await streamQuery(service, body, reply);
      return reply;
    }

    const controller = abortOnDisconnect(reply);
    const result = await service.query(body.messages, { provider: body.provider, signal: controller.signal });
    if (result.success) {
      return reply.code(200).send({ content: result.text });
    }
    return reply.code(statusForKind(result.kind)).send({ error: result.message, kind: result.kind });
  });
}

async function streamQuery(service: LLMService, body: QueryRequest, reply: FastifyReply): Promise<void> {
  reply.hijack();
  const raw = reply.raw;
  raw.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });

  const controller = abortOnDisconnect(reply);
  let streamed = false;
  const result: CanonicalResult = await service.query(body.messages, {
    provider: body.provider,
    signal: controller.signal,
    onChunk: (chunk) => {
      streamed = true;
      raw.write(sseEvent({ chunk }));
    },
  });

  if (controller.signal.aborted) {
    raw.end();
    return;
  }

  if (result.success) {
    // Profiles that do not stream still answer in one piece.
    if (!streamed) {
      raw.write(sseEvent({ chunk: result.text }));
    }
    raw.write(sseEvent({ done: true }));
  } else {
    raw.write(sseEvent({ error: result.message, kind: result.kind }));
  }
  raw.end();
}
