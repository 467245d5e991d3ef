import type { FastifyInstance } from 'fastify';
import type { LLMService } from '../services/llm-service.js';

export async function healthRoutes(app: FastifyInstance, service: LLMService): Promise<void> {
  app.get('/health', async () => ({
    status: 'ok',
    defaultProvider: service.defaultProvider,
    providers: service.listProviders(),
  }));
}
