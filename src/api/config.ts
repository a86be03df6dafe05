import type { FastifyServerOptions } from 'fastify';

/**
 * CORS konfigurace pro API server.
 */
export interface CorsConfig {
  /**
   * Povolené origins.
   *
   * - `true` - povolí všechny origins
   * - `false` - CORS vypnut
   * - `string` / `string[]` - konkrétní origin(s)
   * - `RegExp` - pattern pro matching origins
   *
   * Výchozí: true
   */
  origin?: boolean | string | string[] | RegExp;

  /** Povolené HTTP metody (výchozí: ['GET', 'HEAD', 'POST']) */
  methods?: string[];

  /** Povolené request headers (výchozí: ['Content-Type', 'Authorization']) */
  allowedHeaders?: string[];

  /** Povolit odesílání credentials (výchozí: false) */
  credentials?: boolean;

  /** Cache doba pro preflight requests v sekundách (výchozí: 86400) */
  maxAge?: number;
}

export interface ServerConfig {
  /** Port, na kterém server naslouchá (výchozí: 7226) */
  port: number;

  /** Host address (výchozí: '0.0.0.0') */
  host: string;

  /** Prefix pro API endpoints (výchozí: '/api/v1') */
  apiPrefix: string;

  /**
   * CORS konfigurace.
   *
   * - `true` - zapnout CORS s výchozími hodnotami
   * - `false` - vypnout CORS
   * - `CorsConfig` - detailní konfigurace
   *
   * Výchozí: true
   */
  cors: boolean | CorsConfig;

  /** Zapnout Fastify request logování (výchozí: true) */
  logger: boolean;

  /** Dodatečné Fastify options */
  fastifyOptions: Omit<FastifyServerOptions, 'logger'> | undefined;
}

export type ServerConfigInput = Partial<ServerConfig>;

export const DEFAULT_PORT = 7226;

const DEFAULT_CORS_CONFIG: Required<CorsConfig> = {
  origin: true,
  methods: ['GET', 'HEAD', 'POST'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  credentials: false,
  maxAge: 86400
};

/**
 * Vyřeší CORS konfiguraci do formátu pro @fastify/cors.
 */
export function resolveCorsConfig(
  input: boolean | CorsConfig | undefined
): false | Required<CorsConfig> {
  if (input === false) {
    return false;
  }

  if (input === true || input === undefined) {
    return { ...DEFAULT_CORS_CONFIG };
  }

  return {
    origin: input.origin ?? DEFAULT_CORS_CONFIG.origin,
    methods: input.methods ?? DEFAULT_CORS_CONFIG.methods,
    allowedHeaders: input.allowedHeaders ?? DEFAULT_CORS_CONFIG.allowedHeaders,
    credentials: input.credentials ?? DEFAULT_CORS_CONFIG.credentials,
    maxAge: input.maxAge ?? DEFAULT_CORS_CONFIG.maxAge
  };
}

export function resolveServerConfig(input: ServerConfigInput = {}): ServerConfig {
  return {
    port: input.port ?? DEFAULT_PORT,
    host: input.host ?? '0.0.0.0',
    apiPrefix: input.apiPrefix ?? '/api/v1',
    cors: input.cors ?? true,
    logger: input.logger ?? true,
    fastifyOptions: input.fastifyOptions
  };
}
