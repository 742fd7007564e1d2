import type { AgentId, ChatMessage } from '@/core/types.js';

// ─── Requests ───────────────────────────────────────────────────

/** What the backend needs to start a research turn. */
export interface BackendTurnRequest {
  readonly agentId: AgentId;
  readonly messages: readonly ChatMessage[];
}

// ─── Streams ────────────────────────────────────────────────────

/**
 * An open backend connection. `payloads` is lazy and ordered: each item
 * is one SSE `data` field, yielded as it arrives.
 */
export interface BackendTurnStream {
  /** Backend run id (`X-Agent-ID` header), used to answer a clarification. Null if not sent. */
  readonly runId: string | null;
  readonly payloads: AsyncIterable<string>;
}

// ─── Models ─────────────────────────────────────────────────────

/** One entry of the backend's `/v1/models` listing. Unknown fields are dropped. */
export interface BackendModel {
  readonly id: string;
  readonly ownedBy?: string;
  readonly capabilities?: readonly string[];
}

// ─── Client ─────────────────────────────────────────────────────

export interface BackendStreamClient {
  /** Open a streaming turn for an agent. */
  openTurn(request: BackendTurnRequest, signal: AbortSignal): Promise<BackendTurnStream>;
  /** Answer a clarification request of a suspended backend run. */
  resumeTurn(runId: string, clarification: string, signal: AbortSignal): Promise<BackendTurnStream>;
  /** List the agents the backend serves. */
  listModels(signal?: AbortSignal): Promise<BackendModel[]>;
  /** Probe the backend's liveness endpoint. */
  checkHealth(signal?: AbortSignal): Promise<boolean>;
}

/** `fetch` as the client uses it; tests inject an in-process fake. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
