import { describe, it, expect, beforeEach } from 'vitest';
import { createBackendStreamClient } from '@/backend/stream-client.js';
import type { AgentId, SessionId } from '@/core/types.js';
import type { FragmentSink } from '@/emitter/types.js';
import { decodePayload } from '@/events/decoder.js';
import type { Logger } from '@/observability/logger.js';
import { createMockLogger } from '@/testing/fixtures/routes.js';
import { backendChunks, createFakeBackend } from '@/testing/helpers/fake-backend.js';
import type { FakeBackend } from '@/testing/helpers/fake-backend.js';
import { createSessionStateMachine, FAILURE_MESSAGES } from './state-machine.js';
import type { SessionStateMachine } from './state-machine.js';
import { createTurnController } from './turn-controller.js';
import type { TurnController } from './turn-controller.js';
import { runTurn } from './turn-runner.js';
import type { TurnSource } from './turn-runner.js';
import type { OutputFragment } from './types.js';

interface RecordingSink extends FragmentSink {
  fragments: OutputFragment[];
  finishCalls: number;
}

function createRecordingSink(onWrite?: (fragment: OutputFragment) => void): RecordingSink {
  const sink: RecordingSink = {
    fragments: [],
    finishCalls: 0,
    write(fragment) {
      sink.fragments.push(fragment);
      onWrite?.(fragment);
      return Promise.resolve();
    },
    finish() {
      sink.finishCalls += 1;
      return Promise.resolve();
    },
  };
  return sink;
}

const OPEN: TurnSource = {
  mode: 'open',
  request: {
    agentId: 'sgr_tool_calling_agent' as AgentId,
    messages: [{ role: 'user', content: 'Solar output in 2024?' }],
  },
};

describe('runTurn', () => {
  let backend: FakeBackend;
  let logger: Logger;
  let machine: SessionStateMachine;
  let controller: TurnController;

  beforeEach(() => {
    backend = createFakeBackend();
    logger = createMockLogger();
    machine = createSessionStateMachine({
      sessionId: 'sess-1' as SessionId,
      agentId: 'sgr_tool_calling_agent' as AgentId,
      emitToolCalls: true,
      logger,
    });
    controller = createTurnController({ sessionId: 'sess-1' as SessionId, timeoutMs: 10_000, logger });
  });

  function run(sink: FragmentSink, source: TurnSource = OPEN): ReturnType<typeof runTurn> {
    return runTurn({
      source,
      machine,
      controller,
      sink,
      client: createBackendStreamClient({ baseUrl: 'http://backend.test', logger, fetchImpl: backend.fetch }),
      decode: decodePayload,
      clarificationToolNames: ['clarificationtool'],
      logger,
    });
  }

  it('relays the tool scenario in order without duplicating text', async () => {
    backend.enqueueTurn({
      runId: 'run-1',
      payloads: [
        backendChunks.role(),
        backendChunks.toolCall('1', 'search', { query: 'solar 2024' }),
        backendChunks.toolResult('1', '3 hits'),
        backendChunks.text('Found 3 results'),
        backendChunks.stop('Found 3 results'),
        backendChunks.done(),
      ],
    });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome).toEqual({ phase: 'completed', runId: 'run-1' });
    expect(sink.fragments.map((f) => [f.sequence, f.kind])).toEqual([
      [0, 'tool_annotation'],
      [1, 'tool_annotation'],
      [2, 'text'],
      [3, 'control'],
    ]);
    expect(sink.fragments[3]).toMatchObject({
      isFinal: true,
      control: { type: 'completed', trailingText: '' },
    });
    expect(sink.finishCalls).toBe(1);
    expect(backend.abortedStreams()).toBe(0);
  });

  it('stops at a clarification and keeps the run id for resumption', async () => {
    backend.enqueueTurn({
      runId: 'run-7',
      payloads: [
        backendChunks.toolCall('c1', 'clarificationtool', {
          reasoning: 'ambiguous',
          questions: ['Which year?'],
        }),
        backendChunks.done(),
      ],
    });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome).toEqual({ phase: 'awaiting_clarification', runId: 'run-7' });
    expect(sink.fragments).toEqual([
      {
        kind: 'control',
        control: { type: 'clarification', prompt: 'Which year?' },
        sequence: 0,
        isFinal: false,
      },
    ]);
  });

  it('shows clarification questions whose arguments arrive over several chunks', async () => {
    backend.enqueueTurn({
      runId: 'run-8',
      payloads: [
        backendChunks.toolCallStart('call_a', 'clarificationtool'),
        backendChunks.toolCallArguments('{"questions":["Which '),
        backendChunks.toolCallArguments('year?"]}'),
        backendChunks.toolCall('1-action', 'clarificationtool', { questions: ['Which year?'] }),
        backendChunks.done(),
      ],
    });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome).toEqual({ phase: 'awaiting_clarification', runId: 'run-8' });
    expect(sink.fragments).toEqual([
      {
        kind: 'control',
        control: { type: 'clarification', prompt: 'Which year?' },
        sequence: 0,
        isFinal: false,
      },
    ]);
  });

  it('announces a streamed tool once, with its joined arguments', async () => {
    backend.enqueueTurn({
      payloads: [
        backendChunks.toolCallStart('call_a', 'websearchtool'),
        backendChunks.toolCallArguments('{"query":'),
        backendChunks.toolCallArguments('"solar 2024"}'),
        backendChunks.toolCallsFinished(),
        backendChunks.toolCall('1-action', 'websearchtool', { query: 'solar 2024' }),
        backendChunks.toolResult('1-action', '3 hits'),
        backendChunks.text('Found 3 results'),
        backendChunks.done(),
      ],
    });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome.phase).toBe('completed');
    expect(sink.fragments.map((f) => f.kind)).toEqual(['tool_annotation', 'tool_annotation', 'text', 'control']);
    expect(sink.fragments[0]).toMatchObject({
      annotation: { stage: 'started', callId: 'call_a', toolName: 'websearchtool', arguments: '{"query":"solar 2024"}' },
    });
    expect(sink.fragments[1]).toMatchObject({ annotation: { stage: 'finished', callId: 'call_a', result: '3 hits' } });
    expect(sink.fragments[3]).toMatchObject({ control: { type: 'completed', incompleteToolCalls: [] } });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('resumes a suspended run through the clarification endpoint', async () => {
    backend.enqueueTurn({ payloads: [backendChunks.text('2024: 1.6 TW'), backendChunks.done()] });
    const sink = createRecordingSink();

    const outcome = await run(sink, { mode: 'resume', runId: 'run-7', clarification: '2024' });

    expect(outcome).toEqual({ phase: 'completed', runId: 'run-7' });
    expect(backend.requests[0]).toEqual({
      method: 'POST',
      path: '/agents/run-7/provide_clarification',
      body: { clarifications: '2024' },
    });
  });

  it('fails as truncated when the connection drops mid-turn', async () => {
    backend.enqueueTurn({
      payloads: [backendChunks.text('partial')],
      failAfter: new Error('socket hang up'),
    });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome.phase).toBe('failed');
    expect(sink.fragments).toEqual([
      { kind: 'text', text: 'partial', sequence: 0, isFinal: false },
      {
        kind: 'control',
        control: {
          type: 'failed',
          kind: 'truncated',
          message: FAILURE_MESSAGES.truncated,
          incompleteToolCalls: [],
        },
        sequence: 1,
        isFinal: true,
      },
    ]);
  });

  it('treats a stream that ends without completing as truncated', async () => {
    backend.enqueueTurn({ payloads: [backendChunks.text('partial')] });
    const sink = createRecordingSink();

    await run(sink);

    expect(sink.fragments[1]).toMatchObject({ control: { type: 'failed', kind: 'truncated' } });
  });

  it('fails as unreachable when the backend cannot be contacted', async () => {
    backend.setReachable(false);
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome).toEqual({ phase: 'failed', runId: null });
    expect(sink.fragments).toEqual([
      {
        kind: 'control',
        control: {
          type: 'failed',
          kind: 'unreachable',
          message: FAILURE_MESSAGES.unreachable,
          incompleteToolCalls: [],
        },
        sequence: 0,
        isFinal: true,
      },
    ]);
  });

  it('fails as upstream when the backend rejects the request', async () => {
    backend.enqueueTurn({ payloads: [], status: 503 });
    const sink = createRecordingSink();

    await run(sink);

    expect(sink.fragments[0]).toMatchObject({ control: { type: 'failed', kind: 'upstream' } });
  });

  it('skips undecodable payloads and keeps going', async () => {
    backend.enqueueTurn({ payloads: ['not json', backendChunks.text('ok'), backendChunks.done()] });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome.phase).toBe('completed');
    expect(sink.fragments.map((f) => f.kind)).toEqual(['text', 'control']);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping undecodable backend payload',
      expect.objectContaining({ component: 'turn-runner', error: 'Payload is not valid JSON' }),
    );
  });

  it('reads the backend to its end after completion without aborting it', async () => {
    backend.enqueueTurn({
      payloads: [backendChunks.text('done'), backendChunks.stop(), backendChunks.text('late'), backendChunks.done()],
    });
    const sink = createRecordingSink();

    await run(sink);

    expect(sink.fragments.map((f) => f.kind)).toEqual(['text', 'control']);
    expect(backend.abortedStreams()).toBe(0);
    expect(controller.signal.aborted).toBe(false);
  });

  it('closes the backend connection when the caller goes away', async () => {
    backend.enqueueTurn({ payloads: [backendChunks.text('working')], hold: true });
    const sink = createRecordingSink((fragment) => {
      if (fragment.kind === 'text') controller.cancel('cancelled');
    });

    const outcome = await run(sink);

    expect(outcome.phase).toBe('failed');
    expect(sink.fragments).toHaveLength(2);
    expect(sink.fragments[1]).toMatchObject({
      isFinal: true,
      control: { type: 'failed', kind: 'cancelled', message: FAILURE_MESSAGES.cancelled },
    });
    expect(backend.abortedStreams()).toBe(1);
  });

  it('fails as timed_out when the deadline passes while the backend is silent', async () => {
    controller = createTurnController({ sessionId: 'sess-1' as SessionId, timeoutMs: 20, logger });
    backend.enqueueTurn({ payloads: [backendChunks.text('thinking')], hold: true });
    const sink = createRecordingSink();

    const outcome = await run(sink);

    expect(outcome.phase).toBe('failed');
    expect(sink.fragments.at(-1)).toMatchObject({ control: { type: 'failed', kind: 'timed_out' } });
    expect(backend.abortedStreams()).toBe(1);
  });
});
