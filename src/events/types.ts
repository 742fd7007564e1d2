/**
 * AgentEvent — the backend's event stream, decoded into a closed union.
 *
 * Events arrive in strict backend order. The session state machine
 * never reorders them; it may coalesce (an empty text delta produces
 * no output).
 */
import type { ToolCallId } from '@/core/types.js';

/** Failure categories a stream can end with. */
export type StreamErrorKind =
  | 'unreachable'
  | 'truncated'
  | 'upstream'
  | 'cancelled'
  | 'timed_out';

export type AgentEvent =
  | TextDeltaEvent
  | ToolCallStartedEvent
  | ToolCallFinishedEvent
  | ClarificationRequestedEvent
  | TurnCompletedEvent
  | StreamErrorEvent;

export type AgentEventType = AgentEvent['type'];

/** Streaming text chunk. */
export interface TextDeltaEvent {
  readonly type: 'text_delta';
  readonly text: string;
}

/** The backend started running a tool. */
export interface ToolCallStartedEvent {
  readonly type: 'tool_call_started';
  readonly callId: ToolCallId;
  readonly toolName: string;
  /** Raw JSON argument string as the backend sent it. */
  readonly arguments: string;
}

/** A tool the backend ran has produced its result. */
export interface ToolCallFinishedEvent {
  readonly type: 'tool_call_finished';
  readonly callId: ToolCallId;
  readonly result: string;
}

/** The agent needs an answer from the user before it can continue. */
export interface ClarificationRequestedEvent {
  readonly type: 'clarification_requested';
  readonly prompt: string;
}

/** The backend finished the turn. `finalText` is set when the backend repeats the full answer. */
export interface TurnCompletedEvent {
  readonly type: 'turn_completed';
  readonly finalText: string | null;
}

/** The stream ended abnormally. */
export interface StreamErrorEvent {
  readonly type: 'stream_error';
  readonly kind: StreamErrorKind;
  readonly message: string;
}

/**
 * One piece of a streamed OpenAI tool call. The first piece names the
 * call; later pieces append to its argument string. Only the decoder
 * produces these; the tool call assembler turns them into AgentEvents.
 */
export interface ToolCallChunkEvent {
  readonly type: 'tool_call_chunk';
  readonly index: number;
  readonly callId: string | null;
  readonly toolName: string | null;
  readonly argumentsDelta: string;
}

/** What the decoder yields for one payload. */
export type DecodedPayload = AgentEvent | ToolCallChunkEvent;
