/**
 * Fastify assembly shared by the entry point and the end-to-end tests.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from './error-handler.js';
import { registerOperationalRoutes, registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface CreateServerOptions {
  deps: RouteDependencies;
  /** Skip the per-client rate limit (tests fire many requests at once). */
  disableRateLimit?: boolean;
}

/** Build the HTTP server with plugins, error handling, and all routes. */
export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { deps } = options;
  const { server: serverConfig } = deps.config;

  const server = Fastify({
    logger: false,
  });

  // Register Fastify plugins
  await server.register(cors, {
    origin: serverConfig.corsOrigin ? serverConfig.corsOrigin.split(',') : true,
    exposedHeaders: ['x-session-id'],
  });
  await server.register(helmet);
  if (!options.disableRateLimit) {
    await server.register(rateLimit, { max: serverConfig.rateLimitPerMinute, timeWindow: '1 minute' });
  }

  registerErrorHandler(server, deps.logger);

  await registerOperationalRoutes(server, deps);
  await server.register(
    async (prefixed) => {
      await registerRoutes(prefixed, deps);
    },
    { prefix: '/v1' },
  );

  return server;
}
