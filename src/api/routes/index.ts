import type { FastifyInstance } from 'fastify';
import type { KnowledgeBase } from '../../core/knowledge-base.js';
import type { InferenceEngineConfig } from '../../types/index.js';
import { registerHealthRoutes } from './health.js';
import { registerRulesRoutes } from './rules.js';
import { registerQueryRoutes } from './query.js';

export interface RouteContext {
  knowledge: KnowledgeBase;
  /** Výchozí konfigurace enginu; každý dotaz dostane vlastní instanci */
  engineConfig: InferenceEngineConfig;
}

export async function registerRoutes(
  fastify: FastifyInstance,
  context: RouteContext
): Promise<void> {
  fastify.decorate('knowledge', context.knowledge);

  await registerHealthRoutes(fastify);
  await registerRulesRoutes(fastify);
  await registerQueryRoutes(fastify, context.engineConfig);
}

declare module 'fastify' {
  interface FastifyInstance {
    knowledge: KnowledgeBase;
  }
}
