// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a SessionId where an AgentId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type SessionId = Brand<string, 'SessionId'>;
export type AgentId = Brand<string, 'AgentId'>;
export type ToolCallId = Brand<string, 'ToolCallId'>;

// ─── Conversation ───────────────────────────────────────────────

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

// ─── Chat Turn ──────────────────────────────────────────────────

/**
 * One caller turn, frozen once accepted. A turn that answers a
 * clarification carries the session id of the suspended turn it chains to.
 */
export interface ChatTurnRequest {
  readonly agentId: AgentId;
  readonly conversationHistory: readonly ChatMessage[];
  readonly stream: boolean;
  /** Maximum duration of the turn, including time spent waiting on the caller. */
  readonly timeoutMs: number;
  readonly sessionId?: SessionId;
}

// ─── Agents ─────────────────────────────────────────────────────

export type AgentCapability = 'streaming' | 'tool_calls' | 'clarification';

/** A backend agent exposed to the front-end as a selectable model. */
export interface AgentDescriptor {
  readonly id: AgentId;
  readonly displayName: string;
  readonly capabilities: readonly AgentCapability[];
  /** Owner reported by the backend, shown in the model listing. */
  readonly ownedBy?: string;
}
