import type { FastifyInstance } from 'fastify';
import { version } from '../../utils/version.js';
import { healthSchemas } from '../schemas/health.js';

export interface HealthResponse {
  status: 'ok';
  timestamp: number;
  uptime: number;
  version: string;
  knowledgeBase: {
    rules: number;
    domains: number;
  };
}

export async function registerHealthRoutes(fastify: FastifyInstance): Promise<void> {
  const knowledge = fastify.knowledge;

  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: healthSchemas.health },
    async (): Promise<HealthResponse> => {
      return {
        status: 'ok',
        timestamp: Date.now(),
        uptime: process.uptime(),
        version,
        knowledgeBase: {
          rules: knowledge.size,
          domains: knowledge.domains().length
        }
      };
    }
  );
}
