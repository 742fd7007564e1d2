/**
 * Session types — phases, output fragments, and the per-turn session
 * record the state machine owns.
 */
import type { AgentId, SessionId, ToolCallId } from '@/core/types.js';
import type { StreamErrorKind } from '@/events/types.js';

// ─── Phases ─────────────────────────────────────────────────────

export type SessionPhase =
  | 'idle'
  | 'streaming'
  | 'awaiting_clarification'
  | 'completed'
  | 'failed';

/** Reasons a turn can be cut short from the caller's side. */
export type CancelReason = Extract<StreamErrorKind, 'cancelled' | 'timed_out'>;

export function isTerminalPhase(phase: SessionPhase): boolean {
  return phase === 'completed' || phase === 'failed';
}

// ─── Tool Calls ─────────────────────────────────────────────────

export interface OpenToolCall {
  readonly callId: ToolCallId;
  readonly toolName: string;
  readonly startedAt: Date;
}

// ─── Output Fragments ───────────────────────────────────────────

interface FragmentBase {
  /** Per-session counter; continues across clarification resumption. */
  readonly sequence: number;
  /** True only for the fragment that closes the turn. */
  readonly isFinal: boolean;
}

export interface TextFragment extends FragmentBase {
  readonly kind: 'text';
  readonly text: string;
}

export type ToolAnnotation =
  | {
      readonly stage: 'started';
      readonly callId: ToolCallId;
      readonly toolName: string;
      readonly arguments: string;
    }
  | {
      readonly stage: 'finished';
      readonly callId: ToolCallId;
      readonly toolName: string;
      readonly result: string;
    };

export interface ToolAnnotationFragment extends FragmentBase {
  readonly kind: 'tool_annotation';
  readonly annotation: ToolAnnotation;
}

export type ControlPayload =
  | { readonly type: 'clarification'; readonly prompt: string }
  | {
      readonly type: 'completed';
      /** Completion text the caller has not yet received as deltas. */
      readonly trailingText: string;
      readonly incompleteToolCalls: readonly OpenToolCall[];
    }
  | {
      readonly type: 'failed';
      readonly kind: StreamErrorKind;
      /** Stable, user-safe text; never backend detail. */
      readonly message: string;
      readonly incompleteToolCalls: readonly OpenToolCall[];
    };

export interface ControlFragment extends FragmentBase {
  readonly kind: 'control';
  readonly control: ControlPayload;
}

export type OutputFragment = TextFragment | ToolAnnotationFragment | ControlFragment;

// ─── Session Snapshot ───────────────────────────────────────────

/** Read-only view of a StreamSession. */
export interface SessionSnapshot {
  readonly sessionId: SessionId;
  readonly agentId: AgentId;
  readonly phase: SessionPhase;
  readonly openToolCalls: readonly OpenToolCall[];
  /** Everything sent to the caller as text, across resumptions. */
  readonly text: string;
  readonly cancelled: boolean;
  readonly backendRunId: string | null;
  readonly clarificationCount: number;
  readonly violationCount: number;
  readonly nextSequence: number;
}
