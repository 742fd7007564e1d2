/**
 * Tests for GET /models.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createMockDeps } from '@/testing/fixtures/routes.js';
import { registerErrorHandler } from '../error-handler.js';
import { modelRoutes } from './models.js';
import type { ModelList } from './models.js';

type MockDeps = ReturnType<typeof createMockDeps>;

describe('model routes', () => {
  let app: FastifyInstance;
  let deps: MockDeps;

  beforeEach(() => {
    deps = createMockDeps();
    app = Fastify();
    registerErrorHandler(app, deps.logger);
    modelRoutes(app, deps);
  });

  it('lists backend agents as OpenAI model objects', async () => {
    deps.backend.setModels([
      { id: 'sgr_tool_calling_agent', owned_by: 'sgr' },
      { id: 'sgr_research_agent', capabilities: ['streaming'] },
    ]);

    const response = await app.inject({ method: 'GET', url: '/models' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body) as ModelList;
    expect(body.object).toBe('list');
    expect(body.data).toEqual([
      {
        id: 'sgr_tool_calling_agent',
        object: 'model',
        created: expect.any(Number),
        owned_by: 'sgr',
        name: 'Sgr Tool Calling Agent',
        capabilities: ['streaming', 'tool_calls', 'clarification'],
      },
      {
        id: 'sgr_research_agent',
        object: 'model',
        created: expect.any(Number),
        owned_by: 'research-backend',
        name: 'Sgr Research Agent',
        capabilities: ['streaming'],
      },
    ]);
  });

  it('lists the fallback agents while the backend list is unavailable', async () => {
    deps.backend.setModels(null);

    const response = await app.inject({ method: 'GET', url: '/models' });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body) as ModelList;
    expect(body.data.map((model) => [model.id, model.name, model.owned_by])).toEqual([
      ['sgr_tool_calling_agent', 'Sgr Tool Calling Agent', 'research-backend'],
      ['sgr_research_agent', 'Sgr Research Agent', 'research-backend'],
    ]);
    expect(deps.logger.warn).toHaveBeenCalledWith(
      'Listing fallback agents',
      expect.objectContaining({ component: 'models', count: 2 }),
    );
  });

  it('puts a configured default agent first in the fallback list', async () => {
    deps = createMockDeps({ agents: { defaultAgentId: 'sgr_agent', fallbackAgentIds: ['sgr_research_agent'] } });
    app = Fastify();
    registerErrorHandler(app, deps.logger);
    modelRoutes(app, deps);
    deps.backend.setModels(null);

    const response = await app.inject({ method: 'GET', url: '/models' });

    const body = JSON.parse(response.body) as ModelList;
    expect(body.data.map((model) => model.id)).toEqual(['sgr_agent', 'sgr_research_agent']);
  });
});
