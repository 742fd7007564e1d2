/**
 * Turn runner — the single logical sequence for one turn:
 * backend payload → decode → tool call assembly → state machine →
 * fragment sink.
 *
 * Suspends only at backend reads and sink writes, and both give way to
 * the turn signal. After a terminal phase the backend stream is read to
 * its natural end; only the controller ever aborts the connection.
 */
import { BackendStreamError, toError } from '@/core/errors.js';
import type { BackendStreamClient, BackendTurnRequest, BackendTurnStream } from '@/backend/types.js';
import type { FragmentSink } from '@/emitter/types.js';
import type { EventDecoder } from '@/events/decoder.js';
import { createToolCallAssembler } from '@/events/tool-call-assembler.js';
import type { AgentEvent, StreamErrorKind } from '@/events/types.js';
import type { Logger } from '@/observability/logger.js';
import type { SessionStateMachine } from './state-machine.js';
import type { TurnController } from './turn-controller.js';
import type { OutputFragment, SessionPhase } from './types.js';

const COMPONENT = 'turn-runner';

/** Where the turn's backend stream comes from. */
export type TurnSource =
  | { mode: 'open'; request: BackendTurnRequest }
  | { mode: 'resume'; runId: string; clarification: string };

export interface RunTurnParams {
  source: TurnSource;
  machine: SessionStateMachine;
  controller: TurnController;
  sink: FragmentSink;
  client: BackendStreamClient;
  decode: EventDecoder;
  /** Tool names the backend uses to ask the user a question. */
  clarificationToolNames: readonly string[];
  logger: Logger;
}

export interface TurnOutcome {
  phase: SessionPhase;
  /** Backend run id to resume with after a clarification. */
  runId: string | null;
}

class TurnAbortedError extends Error {
  constructor() {
    super('Turn aborted');
    this.name = 'TurnAbortedError';
  }
}

/** Settle with `promise`, or reject as soon as `signal` aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(new TurnAbortedError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new TurnAbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
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

function openStream(params: RunTurnParams): Promise<BackendTurnStream> {
  const { source, client, controller } = params;
  return source.mode === 'open'
    ? client.openTurn(source.request, controller.signal)
    : client.resumeTurn(source.runId, source.clarification, controller.signal);
}

/**
 * Run one turn to a resting phase: `completed`, `failed`, or
 * `awaiting_clarification`. Never throws for backend or caller failures;
 * they end the turn with a final control fragment.
 */
export async function runTurn(params: RunTurnParams): Promise<TurnOutcome> {
  const { machine, controller, sink, decode, logger } = params;
  const assembler = createToolCallAssembler({ clarificationToolNames: params.clarificationToolNames });
  const { signal } = controller;
  const sessionId = machine.sessionId;
  let runId: string | null = params.source.mode === 'resume' ? params.source.runId : null;

  async function deliver(fragments: OutputFragment[]): Promise<void> {
    for (const fragment of fragments) {
      await sink.write(fragment);
    }
  }

  async function apply(events: AgentEvent[]): Promise<void> {
    for (const event of events) {
      await deliver(machine.apply(event));
      if (signal.aborted) return;
    }
  }

  try {
    const stream = await untilAborted(openStream(params), signal);
    if (stream.runId !== null) runId = stream.runId;
    machine.begin(stream.runId);

    const payloads = stream.payloads[Symbol.asyncIterator]();
    for (;;) {
      const next = await untilAborted(payloads.next(), signal);
      if (next.done) break;

      const decoded = decode(next.value);
      if (!decoded.ok) {
        logger.warn('Skipping undecodable backend payload', {
          component: COMPONENT,
          sessionId,
          error: decoded.error.message,
          ...decoded.error.context,
        });
        continue;
      }

      await apply(assembler.push(decoded.value));
      if (signal.aborted) break;
    }

    if (!signal.aborted) await apply(assembler.flush());

    const reason = controller.reason();
    if (reason !== null) {
      await deliver(machine.cancel(reason));
    } else if (machine.phase() === 'streaming' || machine.phase() === 'idle') {
      await deliver(
        machine.apply({
          type: 'stream_error',
          kind: 'truncated',
          message: 'Backend stream ended before the turn completed',
        }),
      );
    }
  } catch (error) {
    const reason = controller.reason();
    if (reason !== null) {
      await deliver(machine.cancel(reason));
    } else {
      let kind: StreamErrorKind = 'truncated';
      if (error instanceof BackendStreamError) {
        kind = error.kind;
      } else {
        logger.error('Unexpected failure while running turn', {
          component: COMPONENT,
          sessionId,
          error: toError(error).message,
        });
      }
      await deliver(
        machine.apply({ type: 'stream_error', kind, message: toError(error).message }),
      );
    }
  } finally {
    controller.dispose();
  }

  await sink.finish();

  logger.info('Turn finished', {
    component: COMPONENT,
    sessionId,
    agentId: machine.agentId,
    phase: machine.phase(),
    runId,
  });

  return { phase: machine.phase(), runId };
}
