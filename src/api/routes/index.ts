/**
 * Route registration — registers all API route plugins with Fastify.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { chatCompletionRoutes } from './chat-completions.js';
import { healthRoutes } from './health.js';
import { modelRoutes } from './models.js';
import { sessionRoutes } from './sessions.js';

/** Register the OpenAI-compatible routes; mount under `/v1`. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(chatCompletionRoutes, deps);
  await fastify.register(modelRoutes, deps);
  await fastify.register(sessionRoutes, deps);
}

/** Register the unprefixed operational routes. */
export async function registerOperationalRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): Promise<void> {
  await fastify.register(healthRoutes, deps);
}
