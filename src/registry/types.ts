import type { AgentDescriptor } from '@/core/types.js';

/** Read-mostly view of the agents the backend advertises. */
export interface AgentRegistry {
  /** Cached list; stale entries are served while a refresh runs. */
  listAgents(): Promise<readonly AgentDescriptor[]>;
  /** Fetch now. Concurrent callers share one request. */
  refresh(): Promise<readonly AgentDescriptor[]>;
  /** Configured agents to advertise while the backend list is unavailable; the default agent first. */
  fallbackAgents(): readonly AgentDescriptor[];
  /** Map a caller's model id to an agent. Never fails. */
  resolve(modelId: string): Promise<AgentDescriptor>;
}
