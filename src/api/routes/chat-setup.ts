/**
 * Shared chat setup module.
 * Validates an OpenAI-style chat completion request and resolves the
 * session it runs in: a fresh one, or a suspended one that the caller
 * is answering a clarification for. Both the streaming and the
 * non-streaming path share this preparation step.
 */
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { SessionError, ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { AgentId, ChatMessage, ChatRole, ChatTurnRequest, SessionId } from '@/core/types.js';
import { createSessionStateMachine } from '@/session/state-machine.js';
import type { SessionStateMachine } from '@/session/state-machine.js';
import type { TurnSource } from '@/session/turn-runner.js';
import type { RouteDependencies } from '../types.js';

/** Answer to a front-end's title generation task. */
export const TITLE_GENERATION_ANSWER = 'Research Session';

/** Answer to a request flagged `title: true`. */
export const TITLE_FLAG_ANSWER = 'SGR Research';

export const SESSION_HEADER = 'x-session-id';

// ─── Zod Schema ─────────────────────────────────────────────────

const contentPartSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

const messageSchema = z.object({
  role: z.enum(['system', 'developer', 'user', 'assistant', 'tool']),
  content: z.union([z.string(), z.array(contentPartSchema)]).nullish(),
});

/** Zod schema for chat completion request body validation. */
export const chatCompletionRequestSchema = z.object({
  model: z.string().default(''),
  messages: z.array(messageSchema).min(1),
  stream: z.boolean().default(false),
  /** Session to resume after a clarification; the X-Session-Id header works too. */
  session_id: z.string().min(1).max(128).optional(),
  /** Per-request deadline in seconds. */
  timeout: z.number().positive().max(3_600).optional(),
  metadata: z.record(z.unknown()).optional(),
  title: z.boolean().optional(),
});

/** Inferred type from the chat completion request schema. */
export type ChatCompletionRequestBody = z.infer<typeof chatCompletionRequestSchema>;

type RequestMessage = ChatCompletionRequestBody['messages'][number];

// ─── Message Helpers ────────────────────────────────────────────

/** Only text parts of multimodal content are forwarded. */
export function extractText(content: RequestMessage['content']): string {
  if (content === null || content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .filter((part) => part.type === 'text' && part.text !== undefined)
    .map((part) => part.text ?? '')
    .join('\n');
}

function toRole(role: RequestMessage['role']): ChatRole {
  return role === 'developer' ? 'system' : role;
}

export function toChatMessages(messages: readonly RequestMessage[]): ChatMessage[] {
  return messages.map((m) => ({ role: toRole(m.role), content: extractText(m.content) }));
}

/** The caller's latest user message, or null when there is none. */
export function latestUserMessage(messages: readonly ChatMessage[]): string | null {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    const message = messages[i];
    if (message?.role === 'user' && message.content.trim() !== '') return message.content;
  }
  return null;
}

/**
 * Front-ends ask the model for a chat title; that never reaches the
 * backend. Returns the local answer, or null for an ordinary request.
 */
export function titleAnswerFor(body: ChatCompletionRequestBody): string | null {
  if (body.metadata?.['task'] === 'title_generation') return TITLE_GENERATION_ANSWER;
  if (body.title === true) return TITLE_FLAG_ANSWER;
  return null;
}

export function newSessionId(): SessionId {
  return `sess_${nanoid()}` as SessionId;
}

export function newCompletionId(): string {
  return `chatcmpl-${nanoid()}`;
}

// ─── Result Types ───────────────────────────────────────────────

/** Everything needed to run one turn. */
export interface PreparedTurn {
  turn: ChatTurnRequest;
  sessionId: SessionId;
  /** The model id echoed back to the caller. */
  model: string;
  machine: SessionStateMachine;
  source: TurnSource;
  /** True when this request answers a clarification. */
  resumed: boolean;
}

// ─── Setup ──────────────────────────────────────────────────────

/**
 * Resolve the agent and the session for a validated request.
 */
export async function prepareChatTurn(
  body: ChatCompletionRequestBody,
  headerSessionId: string | undefined,
  deps: RouteDependencies,
): Promise<Result<PreparedTurn, SessionError | ValidationError>> {
  const history = toChatMessages(body.messages);
  const userMessage = latestUserMessage(history);
  if (userMessage === null) {
    return err(new ValidationError('No user message found in the request.'));
  }

  const timeoutMs = body.timeout !== undefined ? body.timeout * 1000 : deps.config.backend.requestTimeoutMs;
  const requestedSession = body.session_id ?? headerSessionId;

  if (requestedSession !== undefined) {
    const sessionId = requestedSession as SessionId;
    const suspended = deps.sessionStore.claim(sessionId);
    if (!suspended) {
      return err(new SessionError(`Session "${sessionId}" is not awaiting clarification`, sessionId));
    }

    const resumed = suspended.machine.resume();
    if (!resumed.ok) return err(resumed.error);

    const source: TurnSource =
      suspended.runId !== null
        ? { mode: 'resume', runId: suspended.runId, clarification: userMessage }
        : { mode: 'open', request: { agentId: suspended.agentId, messages: history } };

    deps.logger.info('Resuming session after clarification', {
      component: 'chat-setup',
      sessionId,
      agentId: suspended.agentId,
      mode: source.mode,
    });

    return ok({
      turn: { agentId: suspended.agentId, conversationHistory: history, stream: body.stream, timeoutMs, sessionId },
      sessionId,
      model: body.model === '' ? suspended.agentId : body.model,
      machine: suspended.machine,
      source,
      resumed: true,
    });
  }

  const agent = await deps.agentRegistry.resolve(body.model);
  const sessionId = newSessionId();
  const agentId: AgentId = agent.id;

  return ok({
    turn: { agentId, conversationHistory: history, stream: body.stream, timeoutMs },
    sessionId,
    model: body.model === '' ? agentId : body.model,
    machine: createSessionStateMachine({
      sessionId,
      agentId,
      emitToolCalls: deps.config.output.emitToolCalls,
      logger: deps.logger,
    }),
    source: { mode: 'open', request: { agentId, messages: history } },
    resumed: false,
  });
}
