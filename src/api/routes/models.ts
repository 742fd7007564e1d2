/**
 * Model listing — the backend's agents, shaped as OpenAI model objects so
 * chat front-ends can offer them in their model picker. Until the
 * backend's list has been fetched, the configured fallback agents are
 * listed instead.
 */
import type { FastifyInstance } from 'fastify';
import type OpenAI from 'openai';
import { RegistryUnavailableError } from '@/core/errors.js';
import type { AgentCapability, AgentDescriptor } from '@/core/types.js';
import type { RouteDependencies } from '../types.js';

export type AgentModel = OpenAI.Models.Model & {
  name: string;
  capabilities: readonly AgentCapability[];
};

export interface ModelList {
  object: 'list';
  data: AgentModel[];
}

/** Register the GET /models route. */
export function modelRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  async function currentAgents(): Promise<readonly AgentDescriptor[]> {
    try {
      return await deps.agentRegistry.listAgents();
    } catch (error) {
      if (!(error instanceof RegistryUnavailableError)) throw error;
      const fallback = deps.agentRegistry.fallbackAgents();
      deps.logger.warn('Listing fallback agents', {
        component: 'models',
        error: error.message,
        count: fallback.length,
      });
      return fallback;
    }
  }

  fastify.get('/models', async () => {
    const agents = await currentAgents();
    const created = Math.floor(Date.now() / 1000);
    const list: ModelList = {
      object: 'list',
      data: agents.map((agent) => ({
        id: agent.id,
        object: 'model',
        created,
        owned_by: agent.ownedBy ?? 'research-backend',
        name: agent.displayName,
        capabilities: agent.capabilities,
      })),
    };
    return list;
  });
}
