/**
 * Agent Registry — cached access to the backend's agent list.
 *
 * The snapshot is replaced wholesale on refresh. Readers never wait on a
 * refresh while any snapshot exists; only a cold registry blocks, and
 * never longer than the listing timeout.
 */
import type { BackendModel, BackendStreamClient } from '@/backend/types.js';
import { RegistryUnavailableError, toError } from '@/core/errors.js';
import type { AgentCapability, AgentDescriptor, AgentId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AgentRegistry } from './types.js';

const COMPONENT = 'agent-registry';

export const DEFAULT_CAPABILITIES: readonly AgentCapability[] = ['streaming', 'tool_calls', 'clarification'];

const KNOWN_CAPABILITIES = new Set<string>(DEFAULT_CAPABILITIES);

// ─── Snapshot ────────────────────────────────────────────────────

interface Snapshot {
  agents: readonly AgentDescriptor[];
  byId: ReadonlyMap<string, AgentDescriptor>;
  expiresAt: number;
}

// ─── Registry Dependencies ───────────────────────────────────────

interface RegistryDeps {
  client: Pick<BackendStreamClient, 'listModels'>;
  logger: Logger;
  /** Used for an empty model id. */
  defaultAgentId: string;
  /** Advertised while the backend's list has never been fetched. */
  fallbackAgentIds?: readonly string[];
  /** Cache TTL in milliseconds. Default: 60000 (1 minute). */
  cacheTtlMs?: number;
  /** Deadline for one model listing request. Default: 5000. */
  listTimeoutMs?: number;
  now?: () => number;
}

// ─── Helpers ─────────────────────────────────────────────────────

/** `sgr_research_agent` → `Sgr Research Agent`. */
export function displayNameFor(id: string): string {
  return id
    .replace(/_/g, ' ')
    .replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Strip a pipeline prefix (`sgr_deep_research.sgr_agent` → `sgr_agent`)
 * and fall back to the default agent for an empty id.
 */
export function normalizeModelId(modelId: string, defaultAgentId: string): string {
  const trimmed = modelId.trim();
  const id = trimmed.includes('.') ? trimmed.slice(trimmed.lastIndexOf('.') + 1) : trimmed;
  return id === '' ? defaultAgentId : id;
}

function isCapability(value: string): value is AgentCapability {
  return KNOWN_CAPABILITIES.has(value);
}

function describe(model: BackendModel): AgentDescriptor {
  const capabilities = (model.capabilities ?? []).filter(isCapability);
  return {
    id: model.id as AgentId,
    displayName: displayNameFor(model.id),
    capabilities: capabilities.length > 0 ? capabilities : DEFAULT_CAPABILITIES,
    ...(model.ownedBy !== undefined && { ownedBy: model.ownedBy }),
  };
}

function opaqueDescriptor(id: string): AgentDescriptor {
  return {
    id: id as AgentId,
    displayName: displayNameFor(id),
    capabilities: DEFAULT_CAPABILITIES,
  };
}

/** Settle with `work`, or reject once `signal` aborts; `work` gets the signal too. */
function withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const signal = AbortSignal.timeout(timeoutMs);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error(`Model listing timed out after ${timeoutMs}ms`));
    signal.addEventListener('abort', onAbort, { once: true });
    work(signal).then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an agent registry backed by the backend's model listing.
 */
export function createAgentRegistry(deps: RegistryDeps): AgentRegistry {
  const cacheTtlMs = deps.cacheTtlMs ?? 60000;
  const listTimeoutMs = deps.listTimeoutMs ?? 5000;
  const now = deps.now ?? Date.now;
  const fallback = [...new Set([deps.defaultAgentId, ...(deps.fallbackAgentIds ?? [])])].map(opaqueDescriptor);
  let snapshot: Snapshot | null = null;
  let inFlight: Promise<readonly AgentDescriptor[]> | null = null;

  async function load(): Promise<readonly AgentDescriptor[]> {
    deps.logger.debug('Fetching agent list', { component: COMPONENT });
    const models = await withDeadline((signal) => deps.client.listModels(signal), listTimeoutMs);
    const agents = models.map(describe);
    snapshot = {
      agents,
      byId: new Map<string, AgentDescriptor>(agents.map((a) => [a.id, a])),
      expiresAt: now() + cacheTtlMs,
    };
    deps.logger.info('Agent list refreshed', { component: COMPONENT, count: agents.length });
    return agents;
  }

  const registry: AgentRegistry = {
    refresh(): Promise<readonly AgentDescriptor[]> {
      if (!inFlight) {
        inFlight = load().finally(() => {
          inFlight = null;
        });
      }
      return inFlight;
    },

    async listAgents(): Promise<readonly AgentDescriptor[]> {
      const current = snapshot;
      if (current) {
        if (current.expiresAt <= now()) {
          registry.refresh().catch((error: unknown) => {
            deps.logger.warn('Agent list refresh failed; serving cached list', {
              component: COMPONENT,
              error: toError(error).message,
            });
          });
        }
        return current.agents;
      }

      try {
        return await registry.refresh();
      } catch (error) {
        throw new RegistryUnavailableError(toError(error).message, toError(error));
      }
    },

    fallbackAgents(): readonly AgentDescriptor[] {
      return fallback;
    },

    async resolve(modelId: string): Promise<AgentDescriptor> {
      const id = normalizeModelId(modelId, deps.defaultAgentId);

      try {
        await registry.listAgents();
      } catch (error) {
        deps.logger.warn('Resolving agent without registry', {
          component: COMPONENT,
          agentId: id,
          error: toError(error).message,
        });
        return opaqueDescriptor(id);
      }

      const known = snapshot?.byId.get(id);
      if (known) return known;

      deps.logger.debug('Unknown agent id; passing it through', { component: COMPONENT, agentId: id });
      return opaqueDescriptor(id);
    },
  };

  return registry;
}
