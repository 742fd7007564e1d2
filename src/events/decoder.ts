/**
 * Event Decoder — maps one raw backend payload (an SSE `data` field)
 * to exactly one decoded event.
 *
 * Two dialects share the stream:
 *   - native events: `{ "type": "tool_call_started", "call_id": ..., ... }`
 *   - OpenAI chunks: `{ "choices": [{ "delta": {...}, "finish_reason": ... }] }`,
 *     the `[DONE]` sentinel and `{ "error": {...} }` envelopes
 *
 * Decoding is pure. Unknown fields are ignored; a payload matching no
 * known shape is a DecodeError. OpenAI tool calls come out as
 * `tool_call_chunk` pieces for the tool call assembler to join.
 */
import { z } from 'zod';
import { DecodeError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ToolCallId } from '@/core/types.js';
import { clarificationPromptFrom, truncate } from './tool-arguments.js';
import type { AgentEvent, DecodedPayload } from './types.js';

export const DONE_SENTINEL = '[DONE]';

const LOGGED_PAYLOAD_LENGTH = 200;

// ─── Wire Schemas ───────────────────────────────────────────────

const callIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

/** Tool arguments and results may arrive as JSON text or as structured values. */
const textOrJson = z
  .unknown()
  .transform((value) =>
    value === undefined || value === null
      ? ''
      : typeof value === 'string'
        ? value
        : JSON.stringify(value),
  );

const nativeEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text_delta'), text: z.string() }),
  z.object({
    type: z.literal('tool_call_started'),
    call_id: callIdSchema,
    tool_name: z.string().min(1),
    arguments: textOrJson,
  }),
  z.object({
    type: z.literal('tool_call_finished'),
    call_id: callIdSchema,
    result: textOrJson,
  }),
  z.object({
    type: z.literal('clarification_requested'),
    prompt: z.string().optional(),
    questions: z.array(z.string()).optional(),
  }),
  z.object({
    type: z.literal('turn_completed'),
    final_text: z.string().nullish(),
  }),
  z.object({
    type: z.literal('error'),
    message: z.string().optional(),
  }),
]);

const NATIVE_TYPES = new Set<string>([
  'text_delta',
  'tool_call_started',
  'tool_call_finished',
  'clarification_requested',
  'turn_completed',
  'error',
]);

const toolCallDeltaSchema = z.object({
  index: z.number().int().optional(),
  id: z.string().nullish(),
  function: z
    .object({
      name: z.string().nullish(),
      arguments: z.string().nullish(),
    })
    .nullish(),
});

const chunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          role: z.string().nullish(),
          content: z.string().nullish(),
          tool_calls: z.array(toolCallDeltaSchema).nullish(),
          tool_call_id: z.string().nullish(),
        })
        .nullish(),
      message: z.object({ content: z.string().nullish() }).nullish(),
      finish_reason: z.string().nullish(),
    }),
  ),
});

const errorEnvelopeSchema = z.object({
  error: z.union([
    z.string(),
    z.object({ message: z.string().optional(), type: z.string().optional() }),
  ]),
});

type NativeEvent = z.infer<typeof nativeEventSchema>;
type Chunk = z.infer<typeof chunkSchema>;

// ─── Decoder ────────────────────────────────────────────────────

export type EventDecoder = (raw: string) => Result<DecodedPayload, DecodeError>;

const EMPTY_DELTA: AgentEvent = { type: 'text_delta', text: '' };

function fromNative(event: NativeEvent): AgentEvent {
  switch (event.type) {
    case 'text_delta':
      return { type: 'text_delta', text: event.text };
    case 'tool_call_started':
      return {
        type: 'tool_call_started',
        callId: event.call_id as ToolCallId,
        toolName: event.tool_name,
        arguments: event.arguments,
      };
    case 'tool_call_finished':
      return {
        type: 'tool_call_finished',
        callId: event.call_id as ToolCallId,
        result: event.result,
      };
    case 'clarification_requested':
      return {
        type: 'clarification_requested',
        prompt: clarificationPromptFrom({ questions: event.questions, prompt: event.prompt }),
      };
    case 'turn_completed':
      return { type: 'turn_completed', finalText: event.final_text ?? null };
    case 'error':
      return {
        type: 'stream_error',
        kind: 'upstream',
        message: event.message ?? 'Backend reported an error',
      };
  }
}

function fromChunk(chunk: Chunk): Result<DecodedPayload, DecodeError> {
  const choice = chunk.choices[0];
  // Usage-only chunks carry no choices.
  if (!choice) return ok(EMPTY_DELTA);

  const delta = choice.delta;
  const toolCall = delta?.tool_calls?.[0];

  if (toolCall) {
    const name = toolCall.function?.name;
    return ok({
      type: 'tool_call_chunk',
      index: toolCall.index ?? 0,
      callId: toolCall.id ? toolCall.id : null,
      toolName: name ? name : null,
      argumentsDelta: toolCall.function?.arguments ?? '',
    });
  }

  if (delta?.role === 'tool') {
    if (!delta.tool_call_id) {
      return err(new DecodeError('Tool result chunk is missing tool_call_id'));
    }
    return ok({
      type: 'tool_call_finished',
      callId: delta.tool_call_id as ToolCallId,
      result: delta.content ?? '',
    });
  }

  if (delta?.content) {
    return ok({ type: 'text_delta', text: delta.content });
  }

  if (choice.finish_reason === 'stop') {
    return ok({ type: 'turn_completed', finalText: choice.message?.content ?? null });
  }

  // Role preambles and non-terminal finish reasons.
  return ok(EMPTY_DELTA);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Decode one raw backend payload.
 */
export const decodePayload: EventDecoder = (raw) => {
  const trimmed = raw.trim();
  if (trimmed === DONE_SENTINEL) {
    return ok({ type: 'turn_completed', finalText: null });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return err(new DecodeError('Payload is not valid JSON', { payload: truncate(raw, LOGGED_PAYLOAD_LENGTH) }));
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return err(new DecodeError('Payload is not a JSON object', { payload: truncate(raw, LOGGED_PAYLOAD_LENGTH) }));
  }

  if ('type' in parsed && typeof parsed.type === 'string' && NATIVE_TYPES.has(parsed.type)) {
    const native = nativeEventSchema.safeParse(parsed);
    if (!native.success) {
      return err(
        new DecodeError(`Malformed ${parsed.type} event: ${describeIssues(native.error)}`, {
          payload: truncate(raw, LOGGED_PAYLOAD_LENGTH),
        }),
      );
    }
    return ok(fromNative(native.data));
  }

  if ('choices' in parsed) {
    const chunk = chunkSchema.safeParse(parsed);
    if (!chunk.success) {
      return err(
        new DecodeError(`Malformed completion chunk: ${describeIssues(chunk.error)}`, {
          payload: truncate(raw, LOGGED_PAYLOAD_LENGTH),
        }),
      );
    }
    return fromChunk(chunk.data);
  }

  const envelope = errorEnvelopeSchema.safeParse(parsed);
  if (envelope.success) {
    const error = envelope.data.error;
    return ok({
      type: 'stream_error',
      kind: 'upstream',
      message: typeof error === 'string' ? error : (error.message ?? 'Backend reported an error'),
    });
  }

  return err(new DecodeError('Payload matches no known event shape', { payload: truncate(raw, LOGGED_PAYLOAD_LENGTH) }));
};
