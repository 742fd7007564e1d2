/**
 * Tests for session routes — inspection and cancellation.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AgentId, SessionId } from '@/core/types.js';
import { createSessionStateMachine } from '@/session/state-machine.js';
import { createMockDeps } from '@/testing/fixtures/routes.js';
import { registerErrorHandler } from '../error-handler.js';
import type { ApiErrorBody } from '../types.js';
import { sessionRoutes } from './sessions.js';
import type { SessionResource } from './sessions.js';

// ─── Helpers ────────────────────────────────────────────────────

type MockDeps = ReturnType<typeof createMockDeps>;

function createApp(): { app: FastifyInstance; deps: MockDeps } {
  const deps = createMockDeps();
  const app = Fastify();
  registerErrorHandler(app, deps.logger);
  sessionRoutes(app, deps);
  return { app, deps };
}

function suspendSession(deps: MockDeps): void {
  const machine = createSessionStateMachine({
    sessionId: 'sess_waiting' as SessionId,
    agentId: 'sgr_tool_calling_agent' as AgentId,
    emitToolCalls: true,
    logger: deps.logger,
  });
  machine.begin('run-7');
  machine.apply({ type: 'text_delta', text: 'Looking.' });
  machine.apply({ type: 'clarification_requested', prompt: 'Which year?' });
  deps.sessionStore.suspend({
    sessionId: 'sess_waiting' as SessionId,
    agentId: 'sgr_tool_calling_agent' as AgentId,
    machine,
    runId: 'run-7',
    history: [{ role: 'user', content: 'Solar output?' }],
  });
}

// ─── Tests ──────────────────────────────────────────────────────

describe('session routes', () => {
  let app: FastifyInstance;
  let deps: MockDeps;

  beforeEach(() => {
    ({ app, deps } = createApp());
  });

  describe('GET /sessions', () => {
    it('lists known sessions', async () => {
      suspendSession(deps);

      const response = await app.inject({ method: 'GET', url: '/sessions' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body) as { object: string; data: SessionResource[] };
      expect(body.object).toBe('list');
      expect(body.data.map((s) => [s.id, s.state])).toEqual([['sess_waiting', 'suspended']]);
    });
  });

  describe('GET /sessions/:id', () => {
    it('describes a suspended session', async () => {
      suspendSession(deps);

      const response = await app.inject({ method: 'GET', url: '/sessions/sess_waiting' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body) as SessionResource;
      expect(body).toEqual({
        id: 'sess_waiting',
        object: 'session',
        state: 'suspended',
        agent_id: 'sgr_tool_calling_agent',
        phase: 'awaiting_clarification',
        text_length: 8,
        open_tool_calls: [],
        clarification_count: 1,
        backend_run_id: 'run-7',
        expires_at: expect.any(String),
      });
    });

    it('returns 404 for an unknown session', async () => {
      const response = await app.inject({ method: 'GET', url: '/sessions/sess_unknown' });

      expect(response.statusCode).toBe(404);
      const body = JSON.parse(response.body) as ApiErrorBody;
      expect(body.error.message).toBe('Session "sess_unknown" not found');
    });
  });

  describe('DELETE /sessions/:id', () => {
    it('discards a suspended session', async () => {
      suspendSession(deps);

      const response = await app.inject({ method: 'DELETE', url: '/sessions/sess_waiting' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        id: 'sess_waiting',
        object: 'session.deleted',
        deleted: true,
        outcome: 'discarded',
      });
      expect(deps.sessionStore.get('sess_waiting' as SessionId)).toBeNull();
    });

    it('returns 404 for an unknown session', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/sessions/sess_unknown' });

      expect(response.statusCode).toBe(404);
    });
  });
});
