export { InferenceServer, createApp, type ServerOptions } from './server.js';
export {
  resolveServerConfig,
  DEFAULT_PORT,
  type ServerConfig,
  type ServerConfigInput,
  type CorsConfig
} from './config.js';
export { NotFoundError, ValidationError, type ApiError } from './middleware/error-handler.js';
export { toQueryInput, type QueryResponse } from './routes/query.js';
export type { HealthResponse } from './routes/health.js';
