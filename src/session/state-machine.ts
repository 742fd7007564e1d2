/**
 * Session State Machine — turns the backend's AgentEvent sequence for
 * one turn into ordered OutputFragments.
 *
 *   idle → streaming → awaiting_clarification → streaming → completed
 *                         (any non-terminal) → failed
 *
 * Events are applied one at a time and synchronously. Nothing is
 * processed once `completed` or `failed` is reached; while awaiting
 * clarification, events are dropped until `resume()`.
 */
import { ProtocolViolationError, SessionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentId, SessionId, ToolCallId } from '@/core/types.js';
import type { AgentEvent, StreamErrorKind } from '@/events/types.js';
import type { Logger } from '@/observability/logger.js';
import type {
  CancelReason,
  ControlPayload,
  OpenToolCall,
  OutputFragment,
  SessionPhase,
  SessionSnapshot,
  ToolAnnotation,
} from './types.js';
import { isTerminalPhase } from './types.js';

const COMPONENT = 'session-state-machine';

/** What the caller sees when a turn fails. Backend detail only goes to the log. */
export const FAILURE_MESSAGES: Readonly<Record<StreamErrorKind, string>> = {
  unreachable: 'The research backend could not be reached. Please try again later.',
  truncated: 'The connection to the research backend was interrupted before the answer was complete.',
  upstream: 'The research backend failed while processing this request.',
  cancelled: 'The request was cancelled.',
  timed_out: 'The request took too long and was stopped.',
};

export interface SessionStateMachineOptions {
  sessionId: SessionId;
  agentId: AgentId;
  /** Emit tool annotations; when off, tool calls are tracked only. */
  emitToolCalls: boolean;
  logger: Logger;
  now?: () => Date;
}

export interface SessionStateMachine {
  readonly sessionId: SessionId;
  readonly agentId: AgentId;
  phase(): SessionPhase;
  /** Enter `streaming` for a new backend connection. */
  begin(backendRunId: string | null): void;
  /** Apply one event; returns the fragments it produced, in order. */
  apply(event: AgentEvent): OutputFragment[];
  /** Force `failed`. Idempotent; a no-op once terminal. */
  cancel(reason: CancelReason): OutputFragment[];
  /** Leave `awaiting_clarification` for a chained request. */
  resume(): Result<void, SessionError>;
  snapshot(): SessionSnapshot;
}

/**
 * Create the state machine for one session.
 */
export function createSessionStateMachine(options: SessionStateMachineOptions): SessionStateMachine {
  const { sessionId, agentId, emitToolCalls, logger } = options;
  const now = options.now ?? ((): Date => new Date());

  let phase: SessionPhase = 'idle';
  let text = '';
  /** Where the current connection's text starts within `text`. */
  let segmentStart = 0;
  let sequence = 0;
  let cancelled = false;
  let backendRunId: string | null = null;
  let clarificationCount = 0;
  let violationCount = 0;
  const openToolCalls = new Map<ToolCallId, OpenToolCall>();

  function violation(message: string, context: Record<string, unknown>): void {
    violationCount += 1;
    const error = new ProtocolViolationError(message, sessionId, context);
    logger.warn(error.message, {
      component: COMPONENT,
      sessionId,
      agentId,
      code: error.code,
      ...error.context,
    });
  }

  function textFragment(value: string): OutputFragment {
    return { kind: 'text', text: value, sequence: sequence++, isFinal: false };
  }

  function annotationFragment(annotation: ToolAnnotation): OutputFragment {
    return { kind: 'tool_annotation', annotation, sequence: sequence++, isFinal: false };
  }

  function controlFragment(control: ControlPayload, isFinal: boolean): OutputFragment {
    return { kind: 'control', control, sequence: sequence++, isFinal };
  }

  /** Close out the tool table when a terminal phase is reached. */
  function drainOpenToolCalls(): OpenToolCall[] {
    const incomplete = [...openToolCalls.values()];
    if (incomplete.length > 0) {
      violation('Turn ended with tool calls still open', {
        callIds: incomplete.map((c) => c.callId),
      });
      openToolCalls.clear();
    }
    return incomplete;
  }

  /** Delta-accumulated text wins; the completion text only fills in what was never streamed. */
  function trailingTextFor(finalText: string | null): string {
    if (finalText === null) return '';
    const streamed = text.slice(segmentStart);
    if (streamed === '') return finalText;
    if (finalText.startsWith(streamed)) return finalText.slice(streamed.length);
    logger.warn('Completion text disagrees with streamed text; keeping streamed text', {
      component: COMPONENT,
      sessionId,
      streamedLength: streamed.length,
      finalLength: finalText.length,
    });
    return '';
  }

  function fail(kind: StreamErrorKind): OutputFragment[] {
    phase = 'failed';
    const incompleteToolCalls = drainOpenToolCalls();
    return [
      controlFragment(
        { type: 'failed', kind, message: FAILURE_MESSAGES[kind], incompleteToolCalls },
        true,
      ),
    ];
  }

  function applyActive(event: AgentEvent): OutputFragment[] {
    switch (event.type) {
      case 'text_delta': {
        if (event.text === '') return [];
        text += event.text;
        return [textFragment(event.text)];
      }

      case 'tool_call_started': {
        if (openToolCalls.has(event.callId)) {
          violation('Duplicate tool call id', { callId: event.callId, toolName: event.toolName });
          return [];
        }
        openToolCalls.set(event.callId, {
          callId: event.callId,
          toolName: event.toolName,
          startedAt: now(),
        });
        if (!emitToolCalls) return [];
        return [
          annotationFragment({
            stage: 'started',
            callId: event.callId,
            toolName: event.toolName,
            arguments: event.arguments,
          }),
        ];
      }

      case 'tool_call_finished': {
        const open = openToolCalls.get(event.callId);
        if (!open) {
          violation('Tool call finished without being started', { callId: event.callId });
          return [];
        }
        openToolCalls.delete(event.callId);
        if (!emitToolCalls) return [];
        return [
          annotationFragment({
            stage: 'finished',
            callId: event.callId,
            toolName: open.toolName,
            result: event.result,
          }),
        ];
      }

      case 'clarification_requested': {
        phase = 'awaiting_clarification';
        clarificationCount += 1;
        return [controlFragment({ type: 'clarification', prompt: event.prompt }, false)];
      }

      case 'turn_completed': {
        const trailingText = trailingTextFor(event.finalText);
        text += trailingText;
        phase = 'completed';
        const incompleteToolCalls = drainOpenToolCalls();
        return [controlFragment({ type: 'completed', trailingText, incompleteToolCalls }, true)];
      }

      case 'stream_error': {
        logger.warn('Turn failed', {
          component: COMPONENT,
          sessionId,
          kind: event.kind,
          detail: event.message,
        });
        return fail(event.kind);
      }
    }
  }

  return {
    sessionId,
    agentId,

    phase: () => phase,

    begin(runId: string | null): void {
      if (isTerminalPhase(phase)) {
        logger.debug('Ignoring begin on a terminal session', { component: COMPONENT, sessionId, phase });
        return;
      }
      if (runId !== null) backendRunId = runId;
      phase = 'streaming';
      segmentStart = text.length;
    },

    apply(event: AgentEvent): OutputFragment[] {
      if (isTerminalPhase(phase) || phase === 'awaiting_clarification') {
        logger.debug('Dropping event outside of streaming', {
          component: COMPONENT,
          sessionId,
          phase,
          eventType: event.type,
        });
        return [];
      }
      if (phase === 'idle') {
        phase = 'streaming';
        segmentStart = text.length;
      }
      return applyActive(event);
    },

    cancel(reason: CancelReason): OutputFragment[] {
      if (isTerminalPhase(phase)) return [];
      cancelled = true;
      logger.info('Turn cancelled', { component: COMPONENT, sessionId, reason, phase });
      return fail(reason);
    },

    resume(): Result<void, SessionError> {
      if (phase !== 'awaiting_clarification') {
        return err(new SessionError(`Session is ${phase}, not awaiting clarification`, sessionId, 409));
      }
      phase = 'streaming';
      segmentStart = text.length;
      return ok(undefined);
    },

    snapshot(): SessionSnapshot {
      return {
        sessionId,
        agentId,
        phase,
        openToolCalls: [...openToolCalls.values()],
        text,
        cancelled,
        backendRunId,
        clarificationCount,
        violationCount,
        nextSequence: sequence,
      };
    },
  };
}
