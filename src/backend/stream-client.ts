/**
 * Backend Stream Client — HTTP access to the research agent API.
 *
 * Opens one streaming connection per turn and yields SSE payloads
 * lazily and in order. Cancellation is cooperative: aborting the signal
 * passed to `openTurn`/`resumeTurn` closes the underlying connection.
 */
import { z } from 'zod';
import { BackendStreamError, toError } from '@/core/errors.js';
import { truncate } from '@/events/tool-arguments.js';
import type { Logger } from '@/observability/logger.js';
import { createSseParser } from './sse-parser.js';
import type {
  BackendModel,
  BackendStreamClient,
  BackendTurnRequest,
  BackendTurnStream,
  FetchFn,
} from './types.js';

const COMPONENT = 'backend-client';

/** Backend error bodies are logged, never forwarded; keep the log line bounded. */
const LOGGED_BODY_LENGTH = 500;

const modelListSchema = z.object({
  data: z.array(
    z.object({
      id: z.string().min(1),
      owned_by: z.string().optional(),
      capabilities: z.array(z.string()).optional(),
    }),
  ),
});

export interface BackendStreamClientOptions {
  /** Base URL without a trailing slash. */
  baseUrl: string;
  logger: Logger;
  /** Defaults to the global fetch. */
  fetchImpl?: FetchFn;
}

// ─── Payload Reader ─────────────────────────────────────────────

/**
 * Read an SSE body as a sequence of payloads. A read failure before the
 * first payload is `unreachable`; after it, `truncated`.
 */
async function* readPayloads(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const parser = createSseParser();
  let delivered = 0;

  try {
    for (;;) {
      let chunk: Uint8Array | undefined;
      try {
        const result = await reader.read();
        chunk = result.done ? undefined : result.value;
      } catch (error) {
        throw new BackendStreamError(
          delivered > 0 ? 'truncated' : 'unreachable',
          'Backend stream failed while reading',
          toError(error),
          { delivered },
        );
      }
      if (chunk === undefined) break;

      for (const payload of parser.push(decoder.decode(chunk, { stream: true }))) {
        delivered += 1;
        yield payload;
      }
    }

    const tail = [...parser.push(decoder.decode()), ...parser.end()];
    for (const payload of tail) {
      delivered += 1;
      yield payload;
    }
  } finally {
    reader.releaseLock();
  }
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Create a client for the research backend.
 */
export function createBackendStreamClient(options: BackendStreamClientOptions): BackendStreamClient {
  const fetchImpl: FetchFn = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const { baseUrl, logger } = options;

  async function readErrorBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      return `<unreadable body: ${toError(error).message}>`;
    }
  }

  async function connect(path: string, body: unknown, signal: AbortSignal): Promise<BackendTurnStream> {
    let response: Response;
    try {
      response = await fetchImpl(`${baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'text/event-stream',
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new BackendStreamError('unreachable', `Could not connect to the backend at ${path}`, toError(error));
    }

    if (!response.ok) {
      const detail = await readErrorBody(response);
      logger.warn('Backend rejected streaming request', {
        component: COMPONENT,
        path,
        status: response.status,
        detail: truncate(detail, LOGGED_BODY_LENGTH),
      });
      throw new BackendStreamError('upstream', `Backend responded with HTTP ${response.status}`, undefined, {
        status: response.status,
      });
    }

    if (!response.body) {
      throw new BackendStreamError('unreachable', 'Backend response has no body');
    }

    const runId = response.headers.get('x-agent-id');
    logger.debug('Backend stream opened', { component: COMPONENT, path, runId });

    return { runId, payloads: readPayloads(response.body) };
  }

  return {
    openTurn(request: BackendTurnRequest, signal: AbortSignal): Promise<BackendTurnStream> {
      return connect(
        '/v1/chat/completions',
        {
          model: request.agentId,
          messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
          stream: true,
        },
        signal,
      );
    },

    resumeTurn(runId: string, clarification: string, signal: AbortSignal): Promise<BackendTurnStream> {
      return connect(
        `/agents/${encodeURIComponent(runId)}/provide_clarification`,
        { clarifications: clarification },
        signal,
      );
    },

    async listModels(signal?: AbortSignal): Promise<BackendModel[]> {
      let response: Response;
      try {
        response = await fetchImpl(`${baseUrl}/v1/models`, {
          method: 'GET',
          headers: { accept: 'application/json' },
          signal,
        });
      } catch (error) {
        throw new BackendStreamError('unreachable', 'Could not connect to the backend model listing', toError(error));
      }

      if (!response.ok) {
        throw new BackendStreamError('upstream', `Model listing responded with HTTP ${response.status}`, undefined, {
          status: response.status,
        });
      }

      const parsed = modelListSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new BackendStreamError('upstream', 'Model listing has an unexpected shape', parsed.error);
      }

      return parsed.data.data.map((m) => ({
        id: m.id,
        ...(m.owned_by !== undefined && { ownedBy: m.owned_by }),
        ...(m.capabilities !== undefined && { capabilities: m.capabilities }),
      }));
    },

    async checkHealth(signal?: AbortSignal): Promise<boolean> {
      try {
        const response = await fetchImpl(`${baseUrl}/health`, { method: 'GET', signal });
        return response.ok;
      } catch (error) {
        logger.debug('Backend health probe failed', {
          component: COMPONENT,
          error: toError(error).message,
        });
        return false;
      }
    },
  };
}
