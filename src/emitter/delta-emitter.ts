/**
 * Delta Emitter — writes a turn's fragments to the caller as OpenAI
 * `chat.completion.chunk` server-sent events.
 *
 * The closing chunk carries a `session` extension naming how the turn
 * ended, so a caller can tell a pending clarification from an answer.
 *
 * Frames are written strictly one after another. A full socket buffer
 * holds the writer until `drain`, which in turn holds the turn runner
 * and with it the reads from the backend. The wait ends early when the
 * turn signal aborts or the caller goes away.
 */
import type { Writable } from 'node:stream';
import type OpenAI from 'openai';
import type { SessionId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { ControlPayload, OutputFragment } from '@/session/types.js';
import { renderFragment } from './markdown.js';
import type { FragmentSink, StreamSessionMarker, TurnOutcomeStatus } from './types.js';

type ChatCompletionChunk = OpenAI.Chat.Completions.ChatCompletionChunk;

/** Closing chunk of a stream. */
export type ClosingChunk = ChatCompletionChunk & { session: StreamSessionMarker };
type ChunkChoice = ChatCompletionChunk['choices'][number];

const COMPONENT = 'delta-emitter';

export const SSE_DONE_FRAME = 'data: [DONE]\n\n';

export interface DeltaEmitterOptions {
  /** The caller's response stream. */
  out: Writable;
  completionId: string;
  /** Model id echoed in every chunk. */
  model: string;
  sessionId: SessionId;
  signal: AbortSignal;
  logger: Logger;
  /** Unix seconds; defaults to now. */
  created?: number;
}

const OUTCOME_STATUS: Readonly<Record<ControlPayload['type'], TurnOutcomeStatus>> = {
  completed: 'completed',
  clarification: 'awaiting_clarification',
  failed: 'failed',
};

export function sseFrame(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/** Resolve once `out` can take more data, closes, or `signal` aborts. */
function waitForDrain(out: Writable, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = (): void => {
      out.off('drain', done);
      out.off('close', done);
      signal.removeEventListener('abort', done);
      resolve();
    };
    if (signal.aborted) {
      resolve();
      return;
    }
    out.on('drain', done);
    out.on('close', done);
    signal.addEventListener('abort', done, { once: true });
  });
}

export function createDeltaEmitter(options: DeltaEmitterOptions): FragmentSink {
  const { out, completionId, model, sessionId, signal, logger } = options;
  const created = options.created ?? Math.floor(Date.now() / 1000);

  let chain: Promise<void> = Promise.resolve();
  let started = false;
  let terminated = false;
  let ended = false;
  let dropped = 0;
  let status: TurnOutcomeStatus = 'completed';

  function chunk(delta: ChunkChoice['delta'], finishReason: ChunkChoice['finish_reason']): ChatCompletionChunk {
    return {
      id: completionId,
      object: 'chat.completion.chunk',
      created,
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason, logprobs: null }],
    };
  }

  function isClosed(): boolean {
    return out.destroyed || out.writableEnded;
  }

  async function writeFrame(frame: string): Promise<void> {
    if (isClosed()) {
      if (dropped === 0) {
        logger.debug('Caller stream closed; dropping further output', { component: COMPONENT, sessionId });
      }
      dropped += 1;
      return;
    }
    if (!out.write(frame)) {
      await waitForDrain(out, signal);
    }
  }

  function enqueue(frames: string[]): Promise<void> {
    chain = chain.then(async () => {
      for (const frame of frames) {
        await writeFrame(frame);
      }
    });
    return chain;
  }

  function contentFrames(content: string): string[] {
    const frames: string[] = [];
    if (!started) {
      started = true;
      frames.push(sseFrame(chunk({ role: 'assistant', content: '' }, null)));
    }
    if (content !== '') frames.push(sseFrame(chunk({ content }, null)));
    return frames;
  }

  function terminalFrames(): string[] {
    if (terminated) return [];
    terminated = true;
    const closing: ClosingChunk = { ...chunk({}, 'stop'), session: { id: sessionId, status } };
    return [...contentFrames(''), sseFrame(closing), SSE_DONE_FRAME];
  }

  return {
    write(fragment: OutputFragment): Promise<void> {
      if (terminated) {
        logger.debug('Fragment after the final marker dropped', {
          component: COMPONENT,
          sessionId,
          sequence: fragment.sequence,
        });
        return chain;
      }
      if (fragment.kind === 'control') status = OUTCOME_STATUS[fragment.control.type];
      const frames = contentFrames(renderFragment(fragment));
      if (fragment.isFinal) frames.push(...terminalFrames());
      return enqueue(frames);
    },

    finish(): Promise<void> {
      const frames = terminalFrames();
      const pending = frames.length > 0 ? enqueue(frames) : chain;
      chain = pending.then(() => {
        if (ended) return;
        ended = true;
        if (!isClosed()) out.end();
      });
      return chain;
    },
  };
}
