/**
 * Chat completions route — the OpenAI-compatible entry point.
 *
 * Streaming requests get `chat.completion.chunk` events ending in
 * `data: [DONE]`; non-streaming requests get one `chat.completion` with
 * `tool_activity` and `session` extension fields. A turn that stops on a
 * clarification leaves its session suspended; the caller answers by
 * sending the next message with the same session id.
 */
import type { FastifyInstance, FastifyReply } from 'fastify';
import type OpenAI from 'openai';
import { TurnFailedError } from '@/core/errors.js';
import type { SessionId } from '@/core/types.js';
import { createDeltaEmitter } from '@/emitter/delta-emitter.js';
import { createTurnAccumulator } from '@/emitter/turn-accumulator.js';
import type { AccumulatedTurn, FragmentSink, ToolActivity } from '@/emitter/types.js';
import type { StreamErrorKind } from '@/events/types.js';
import { createTurnController } from '@/session/turn-controller.js';
import type { TurnController } from '@/session/turn-controller.js';
import { runTurn } from '@/session/turn-runner.js';
import type { TurnOutcome } from '@/session/turn-runner.js';
import { sendError } from '../error-handler.js';
import type { RouteDependencies } from '../types.js';
import {
  chatCompletionRequestSchema,
  newCompletionId,
  newSessionId,
  prepareChatTurn,
  SESSION_HEADER,
  titleAnswerFor,
} from './chat-setup.js';
import type { PreparedTurn } from './chat-setup.js';

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

/** HTTP status a non-streaming caller gets for each failure kind. */
const FAILURE_STATUS: Readonly<Record<StreamErrorKind, number>> = {
  unreachable: 502,
  truncated: 502,
  upstream: 502,
  timed_out: 504,
  cancelled: 499,
};

// ─── Response Shapes ────────────────────────────────────────────

export interface SessionSummary {
  id: string;
  status: 'completed' | 'awaiting_clarification';
  clarification_prompt: string | null;
  expires_at: string | null;
}

export type BridgeChatCompletion = ChatCompletion & {
  tool_activity: ToolActivity[];
  session: SessionSummary;
};

function completionBody(id: string, model: string, content: string): ChatCompletion {
  return {
    id,
    object: 'chat.completion',
    created: Math.floor(Date.now() / 1000),
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content, refusal: null },
        finish_reason: 'stop',
        logprobs: null,
      },
    ],
  };
}

function visibleContent(result: AccumulatedTurn): string {
  return [result.text, result.clarificationPrompt ?? '']
    .filter((part) => part !== '')
    .join('\n\n');
}

// ─── Turn Execution ─────────────────────────────────────────────

/**
 * Run the prepared turn into `sink` and file the session afterwards:
 * suspended when waiting on the caller, forgotten otherwise.
 */
async function executeTurn(
  prepared: PreparedTurn,
  controller: TurnController,
  sink: FragmentSink,
  deps: RouteDependencies,
): Promise<TurnOutcome> {
  const { sessionId, machine, turn, source } = prepared;
  deps.sessionStore.track({ sessionId, agentId: turn.agentId, machine, controller });

  const outcome = await runTurn({
    source,
    machine,
    controller,
    sink,
    client: deps.backendClient,
    decode: deps.decode,
    clarificationToolNames: deps.config.agents.clarificationToolNames,
    logger: deps.logger,
  });

  if (outcome.phase === 'awaiting_clarification') {
    deps.sessionStore.suspend({
      sessionId,
      agentId: turn.agentId,
      machine,
      runId: outcome.runId,
      history: turn.conversationHistory,
    });
  } else {
    deps.sessionStore.release(sessionId);
  }
  return outcome;
}

function openEventStream(reply: FastifyReply, sessionId: SessionId): void {
  reply.hijack();
  const headers = {
    ...reply.getHeaders(),
    'content-type': 'text/event-stream; charset=utf-8',
    'cache-control': 'no-cache, no-transform',
    connection: 'keep-alive',
    'x-accel-buffering': 'no',
    [SESSION_HEADER]: sessionId,
  };
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) reply.raw.setHeader(name, value);
  }
  reply.raw.writeHead(200);
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the POST /chat/completions route. */
export function chatCompletionRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  fastify.post('/chat/completions', async (request, reply) => {
    // 1. Validate request
    const body = chatCompletionRequestSchema.parse(request.body);

    // 2. Title generation never reaches the backend
    const title = titleAnswerFor(body);
    if (title !== null) {
      const sessionId = newSessionId();
      const completion = completionBody(newCompletionId(), body.model, title);
      const response: BridgeChatCompletion = {
        ...completion,
        tool_activity: [],
        session: { id: sessionId, status: 'completed', clarification_prompt: null, expires_at: null },
      };
      reply.header(SESSION_HEADER, sessionId);
      return response;
    }

    // 3. Resolve agent and session
    const header = request.headers[SESSION_HEADER];
    const setupResult = await prepareChatTurn(body, typeof header === 'string' ? header : undefined, deps);
    if (!setupResult.ok) {
      return sendError(
        reply,
        setupResult.error.code,
        setupResult.error.message,
        setupResult.error.statusCode,
        setupResult.error.context,
      );
    }

    const prepared = setupResult.value;
    const { sessionId, model, turn } = prepared;
    const completionId = newCompletionId();

    // 4. Deadline plus cancellation on caller disconnect
    const controller = createTurnController({ sessionId, timeoutMs: turn.timeoutMs, logger: deps.logger });
    let settled = false;
    reply.raw.on('close', () => {
      if (!settled && !reply.raw.writableFinished) {
        controller.cancel('cancelled');
      }
    });

    deps.logger.info('Starting turn', {
      component: 'chat-completions',
      sessionId,
      agentId: turn.agentId,
      stream: turn.stream,
      resumed: prepared.resumed,
    });

    // 5a. Streaming: SSE chunks straight to the socket
    if (turn.stream) {
      openEventStream(reply, sessionId);
      const emitter = createDeltaEmitter({
        out: reply.raw,
        completionId,
        model,
        sessionId,
        signal: controller.signal,
        logger: deps.logger,
      });
      await executeTurn(prepared, controller, emitter, deps);
      settled = true;
      return;
    }

    // 5b. Non-streaming: collect, then answer once
    const accumulator = createTurnAccumulator();
    await executeTurn(prepared, controller, accumulator, deps);
    settled = true;
    const result = accumulator.result();

    if (result.status === 'failed') {
      const kind = result.failure?.kind ?? 'truncated';
      throw new TurnFailedError(
        kind,
        result.failure?.message ?? 'The turn ended without an answer.',
        FAILURE_STATUS[kind],
        sessionId,
      );
    }

    const suspended = result.status === 'awaiting_clarification' ? deps.sessionStore.get(sessionId) : null;
    const response: BridgeChatCompletion = {
      ...completionBody(completionId, model, visibleContent(result)),
      tool_activity: result.toolActivity,
      session: {
        id: sessionId,
        status: result.status,
        clarification_prompt: result.clarificationPrompt,
        expires_at: suspended?.expiresAt?.toISOString() ?? null,
      },
    };
    reply.header(SESSION_HEADER, sessionId);
    return response;
  });
}
