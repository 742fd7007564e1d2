/**
 * Global Fastify error handler and response helpers.
 * Maps BridgeError subclasses and ZodError to the OpenAI error envelope
 * that chat front-ends already know how to display.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { BridgeError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { ApiErrorBody } from './types.js';

// ─── Response Helpers ───────────────────────────────────────────

/** OpenAI error family for an HTTP status. */
export function errorTypeFor(statusCode: number): string {
  if (statusCode === 404) return 'not_found_error';
  if (statusCode === 429) return 'rate_limit_error';
  if (statusCode === 499) return 'request_cancelled';
  if (statusCode >= 500) return 'server_error';
  return 'invalid_request_error';
}

/** Send an error response wrapped in the OpenAI error envelope. */
export async function sendError(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 500,
  details?: Record<string, unknown>,
): Promise<void> {
  const body: ApiErrorBody = {
    error: { message, type: errorTypeFor(statusCode), code, ...(details && { details }) },
  };
  await reply.status(statusCode).send(body);
}

/** Send a 404 not-found response. */
export async function sendNotFound(
  reply: FastifyReply,
  resource: string,
  id: string,
): Promise<void> {
  await sendError(reply, 'NOT_FOUND', `${resource} "${id}" not found`, 404);
}

// ─── Global Error Handler ───────────────────────────────────────

/** Register the global Fastify error handler. */
export function registerErrorHandler(fastify: FastifyInstance, logger: Logger): void {
  fastify.setErrorHandler(async (error, _request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      const issues = error.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      }));
      await sendError(reply, 'VALIDATION_ERROR', 'Request validation failed', 400, { issues });
      return;
    }

    // BridgeError hierarchy — use the error's own statusCode and code
    if (error instanceof BridgeError) {
      logger.warn('Request failed with BridgeError', {
        component: 'error-handler',
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
      });
      await sendError(reply, error.code, error.message, error.statusCode, error.context);
      return;
    }

    // Fastify built-in errors (e.g., JSON parse failures, rate limiting)
    if (typeof error.statusCode === 'number') {
      await sendError(reply, error.code || 'REQUEST_ERROR', error.message, error.statusCode);
      return;
    }

    // Unknown errors
    logger.error('Unhandled error in request', {
      component: 'error-handler',
      error: error.message,
      stack: error.stack,
    });
    await sendError(reply, 'INTERNAL_ERROR', 'An unexpected error occurred', 500);
  });
}
