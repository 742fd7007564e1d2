import type { OutputFragment } from '@/session/types.js';
import type { StreamErrorKind } from '@/events/types.js';

/** Where a turn's fragments go. Writes resolve in order, one at a time. */
export interface FragmentSink {
  write(fragment: OutputFragment): Promise<void>;
  /** Close the response. Safe to call more than once. */
  finish(): Promise<void>;
}

// ─── Non-Streaming Summary ──────────────────────────────────────

export type ToolActivityStatus = 'completed' | 'pending' | 'incomplete';

export interface ToolActivity {
  callId: string;
  toolName: string;
  arguments: string;
  result: string | null;
  status: ToolActivityStatus;
}

export type TurnOutcomeStatus = 'completed' | 'awaiting_clarification' | 'failed';

/**
 * Extension field on the closing stream chunk. `awaiting_clarification`
 * means the session stays open for the caller's answer.
 */
export interface StreamSessionMarker {
  id: string;
  status: TurnOutcomeStatus;
}

/** Everything a non-streaming caller gets back for one turn. */
export interface AccumulatedTurn {
  status: TurnOutcomeStatus;
  text: string;
  toolActivity: ToolActivity[];
  clarificationPrompt: string | null;
  failure: { kind: StreamErrorKind; message: string } | null;
}
