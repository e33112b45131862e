import Fastify from 'fastify';
import { createLoggerOptions } from '../logger.js';
import type { TableStore } from '../types.js';
import { registerApiKeyAuth } from './middleware/auth.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerQueryRoutes } from './routes/query.js';
import { registerTableRoutes } from './routes/tables.js';

export interface ServerOptions {
  apiKey: string;
  strictSelectors?: boolean;
  /** pino level, or false to run without a logger. */
  logLevel?: string | false;
}

export function buildServer(store: TableStore, options: ServerOptions) {
  const app = Fastify({
    logger: options.logLevel === false ? false : createLoggerOptions(options.logLevel ?? 'info'),
  });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    registerApiKeyAuth(instance, options.apiKey);
    await registerTableRoutes(instance, store);
    await registerQueryRoutes(instance, store, options.strictSelectors);
  }, { prefix });

  return app;
}
