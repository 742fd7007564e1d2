/**
 * Tool call assembler — joins streamed OpenAI tool call pieces into
 * complete AgentEvents, one assembler per turn.
 *
 * A call stays open while continuation pieces (same index, no new id)
 * append to its arguments. The next piece that is not a continuation,
 * any other event, or `flush()` releases it as `tool_call_started`, or
 * as `clarification_requested` for a clarification tool.
 *
 * After streaming the tool it selected, the backend repeats it as one
 * `N-action` call. A released call with the same tool name as the call
 * released just before it, with nothing in between, is that repeat: it
 * produces no event, and results reported under its id are credited to
 * the streamed call.
 */
import type { ToolCallId } from '@/core/types.js';
import { extractClarificationPrompt } from './tool-arguments.js';
import type { AgentEvent, DecodedPayload, ToolCallChunkEvent } from './types.js';

export interface ToolCallAssemblerOptions {
  /** Tool names that mean "ask the user" rather than "run a tool". */
  clarificationToolNames: readonly string[];
}

export interface ToolCallAssembler {
  /** Feed one decoded payload; returns the events now complete, in order. */
  push(payload: DecodedPayload): AgentEvent[];
  /** Release the open call, if any, at the end of the stream. */
  flush(): AgentEvent[];
}

interface OpenCall {
  index: number;
  callId: ToolCallId;
  toolName: string;
  arguments: string;
}

interface ReleasedCall {
  callId: ToolCallId;
  toolName: string;
}

/** Events that separate a streamed call from a later call of the same tool. */
function interrupts(event: AgentEvent): boolean {
  return !(event.type === 'text_delta' && event.text === '');
}

export function createToolCallAssembler(options: ToolCallAssemblerOptions): ToolCallAssembler {
  const clarificationTools = new Set(options.clarificationToolNames);
  let open: OpenCall | null = null;
  let lastReleased: ReleasedCall | null = null;
  const aliases = new Map<ToolCallId, ToolCallId>();

  function release(): AgentEvent[] {
    if (!open) return [];
    const call = open;
    open = null;

    if (lastReleased !== null && lastReleased.toolName === call.toolName) {
      aliases.set(call.callId, lastReleased.callId);
      lastReleased = null;
      return [];
    }

    lastReleased = { callId: call.callId, toolName: call.toolName };
    if (clarificationTools.has(call.toolName)) {
      return [{ type: 'clarification_requested', prompt: extractClarificationPrompt(call.arguments) }];
    }
    return [
      { type: 'tool_call_started', callId: call.callId, toolName: call.toolName, arguments: call.arguments },
    ];
  }

  function isContinuation(chunk: ToolCallChunkEvent, call: OpenCall): boolean {
    if (chunk.index !== call.index) return false;
    return chunk.callId === null || chunk.callId === call.callId;
  }

  function pushChunk(chunk: ToolCallChunkEvent): AgentEvent[] {
    if (open !== null && isContinuation(chunk, open)) {
      open.arguments += chunk.argumentsDelta;
      return [];
    }

    const released = release();
    // A continuation with no call to continue carries nothing to show.
    if (chunk.toolName !== null) {
      open = {
        index: chunk.index,
        callId: (chunk.callId ?? String(chunk.index)) as ToolCallId,
        toolName: chunk.toolName,
        arguments: chunk.argumentsDelta,
      };
    }
    return released;
  }

  return {
    push(payload) {
      if (payload.type === 'tool_call_chunk') return pushChunk(payload);

      const released = release();
      if (interrupts(payload)) lastReleased = null;

      if (payload.type === 'tool_call_finished') {
        const callId = aliases.get(payload.callId) ?? payload.callId;
        return [...released, { ...payload, callId }];
      }
      return [...released, payload];
    },

    flush() {
      return release();
    },
  };
}
