/**
 * Session routes — inspect or cancel a live or suspended session.
 */
import type { FastifyInstance } from 'fastify';
import type { SessionId } from '@/core/types.js';
import type { SessionView } from '@/session/session-store.js';
import type { RouteDependencies } from '../types.js';
import { sendNotFound } from '../error-handler.js';

export interface SessionResource {
  id: string;
  object: 'session';
  state: SessionView['state'];
  agent_id: string;
  phase: string;
  text_length: number;
  open_tool_calls: { call_id: string; tool_name: string; started_at: string }[];
  clarification_count: number;
  backend_run_id: string | null;
  expires_at: string | null;
}

function toResource(view: SessionView): SessionResource {
  const { snapshot } = view;
  return {
    id: snapshot.sessionId,
    object: 'session',
    state: view.state,
    agent_id: snapshot.agentId,
    phase: snapshot.phase,
    text_length: snapshot.text.length,
    open_tool_calls: snapshot.openToolCalls.map((call) => ({
      call_id: call.callId,
      tool_name: call.toolName,
      started_at: call.startedAt.toISOString(),
    })),
    clarification_count: snapshot.clarificationCount,
    backend_run_id: snapshot.backendRunId,
    expires_at: view.expiresAt?.toISOString() ?? null,
  };
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register session routes. */
export function sessionRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { sessionStore } = deps;

  // GET /sessions
  fastify.get('/sessions', () => {
    return { object: 'list', data: sessionStore.list().map(toResource) };
  });

  // GET /sessions/:id
  fastify.get<{ Params: { id: string } }>('/sessions/:id', async (request, reply) => {
    const view = sessionStore.get(request.params.id as SessionId);
    if (!view) return sendNotFound(reply, 'Session', request.params.id);
    return toResource(view);
  });

  // DELETE /sessions/:id
  fastify.delete<{ Params: { id: string } }>('/sessions/:id', async (request, reply) => {
    const outcome = sessionStore.cancel(request.params.id as SessionId);
    if (outcome === 'not_found') return sendNotFound(reply, 'Session', request.params.id);

    deps.logger.info('Session cancelled by request', {
      component: 'sessions-route',
      sessionId: request.params.id,
      outcome,
    });
    return { id: request.params.id, object: 'session.deleted', deleted: true, outcome };
  });
}
