/**
 * Non-streaming sink: collects a whole turn into one answer plus a
 * structured summary of tool activity.
 */
import type { OutputFragment } from '@/session/types.js';
import type { AccumulatedTurn, FragmentSink, ToolActivity } from './types.js';

export interface TurnAccumulator extends FragmentSink {
  /** The turn as it stands; complete once `finish()` has resolved. */
  result(): AccumulatedTurn;
}

export function createTurnAccumulator(): TurnAccumulator {
  let text = '';
  const activity = new Map<string, ToolActivity>();
  let outcome: Pick<AccumulatedTurn, 'status' | 'clarificationPrompt' | 'failure'> = {
    status: 'failed',
    clarificationPrompt: null,
    failure: null,
  };

  function markIncomplete(calls: readonly { callId: string; toolName: string }[]): void {
    for (const call of calls) {
      const known = activity.get(call.callId);
      activity.set(call.callId, {
        callId: call.callId,
        toolName: call.toolName,
        arguments: known?.arguments ?? '',
        result: null,
        status: 'incomplete',
      });
    }
  }

  return {
    write(fragment: OutputFragment): Promise<void> {
      switch (fragment.kind) {
        case 'text':
          text += fragment.text;
          break;

        case 'tool_annotation': {
          const annotation = fragment.annotation;
          if (annotation.stage === 'started') {
            activity.set(annotation.callId, {
              callId: annotation.callId,
              toolName: annotation.toolName,
              arguments: annotation.arguments,
              result: null,
              status: 'pending',
            });
          } else {
            const known = activity.get(annotation.callId);
            activity.set(annotation.callId, {
              callId: annotation.callId,
              toolName: annotation.toolName,
              arguments: known?.arguments ?? '',
              result: annotation.result,
              status: 'completed',
            });
          }
          break;
        }

        case 'control': {
          const control = fragment.control;
          if (control.type === 'clarification') {
            outcome = { status: 'awaiting_clarification', clarificationPrompt: control.prompt, failure: null };
          } else if (control.type === 'completed') {
            text += control.trailingText;
            markIncomplete(control.incompleteToolCalls);
            outcome = { status: 'completed', clarificationPrompt: null, failure: null };
          } else {
            markIncomplete(control.incompleteToolCalls);
            outcome = {
              status: 'failed',
              clarificationPrompt: null,
              failure: { kind: control.kind, message: control.message },
            };
          }
          break;
        }
      }
      return Promise.resolve();
    },

    finish(): Promise<void> {
      return Promise.resolve();
    },

    result(): AccumulatedTurn {
      return {
        ...outcome,
        text,
        toolActivity: [...activity.values()],
      };
    },
  };
}
