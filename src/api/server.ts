import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { KnowledgeBase } from '../core/knowledge-base.js';
import type { InferenceEngineConfig } from '../types/index.js';
import {
  resolveCorsConfig,
  resolveServerConfig,
  type ServerConfig,
  type ServerConfigInput
} from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { registerRoutes } from './routes/index.js';

export interface ServerOptions {
  /** Konfigurace HTTP serveru */
  server?: ServerConfigInput;

  /** Báze znalostí, nad kterou běží dotazy (výchozí: prázdná) */
  knowledge?: KnowledgeBase;

  /**
   * Výchozí konfigurace enginu. Strategii a limit cyklů může
   * přepsat každý dotaz.
   */
  engineConfig?: InferenceEngineConfig;
}

/**
 * Sestaví Fastify instanci se všemi routami, bez naslouchání na portu.
 * Testy ji používají přes `inject()`.
 */
export async function createApp(
  options: ServerOptions = {},
  config: ServerConfig = resolveServerConfig(options.server)
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: config.logger,
    ajv: {
      customOptions: {
        coerceTypes: false,
        removeAdditional: false,
        useDefaults: true,
        allErrors: true
      }
    },
    ...config.fastifyOptions
  });

  fastify.setErrorHandler(errorHandler);

  const corsConfig = resolveCorsConfig(config.cors);
  if (corsConfig !== false) {
    await fastify.register(cors, {
      origin: corsConfig.origin,
      methods: corsConfig.methods,
      allowedHeaders: corsConfig.allowedHeaders,
      credentials: corsConfig.credentials,
      maxAge: corsConfig.maxAge
    });
  }

  const routeContext = {
    knowledge: options.knowledge ?? new KnowledgeBase(),
    engineConfig: options.engineConfig ?? {}
  };

  await fastify.register(
    async (instance) => {
      await registerRoutes(instance, routeContext);
    },
    { prefix: config.apiPrefix }
  );

  return fastify;
}

export class InferenceServer {
  private readonly fastify: FastifyInstance;
  private readonly config: ServerConfig;

  private constructor(fastify: FastifyInstance, config: ServerConfig) {
    this.fastify = fastify;
    this.config = config;
  }

  static async start(options: ServerOptions = {}): Promise<InferenceServer> {
    const config = resolveServerConfig(options.server);
    const fastify = await createApp(options, config);

    await fastify.listen({ port: config.port, host: config.host });

    return new InferenceServer(fastify, config);
  }

  get address(): string {
    const addr = this.fastify.server.address();
    if (typeof addr === 'string') {
      return addr;
    }
    if (addr) {
      return `http://${addr.address === '::' || addr.address === '0.0.0.0' ? 'localhost' : addr.address}:${addr.port}`;
    }
    return '';
  }

  get port(): number {
    return this.config.port;
  }

  get apiPrefix(): string {
    return this.config.apiPrefix;
  }

  async stop(): Promise<void> {
    await this.fastify.close();
  }
}
