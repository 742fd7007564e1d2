import { describe, it, expect } from 'vitest';
import { BackendStreamError } from '@/core/errors.js';
import type { AgentId } from '@/core/types.js';
import { createMockLogger } from '@/testing/fixtures/routes.js';
import { backendChunks, createFakeBackend } from '@/testing/helpers/fake-backend.js';
import { createBackendStreamClient } from './stream-client.js';

const BASE_URL = 'http://backend.test';

async function collect(payloads: AsyncIterable<string>): Promise<string[]> {
  const seen: string[] = [];
  for await (const payload of payloads) seen.push(payload);
  return seen;
}

function setup(): {
  backend: ReturnType<typeof createFakeBackend>;
  client: ReturnType<typeof createBackendStreamClient>;
} {
  const backend = createFakeBackend();
  const client = createBackendStreamClient({
    baseUrl: BASE_URL,
    logger: createMockLogger(),
    fetchImpl: backend.fetch,
  });
  return { backend, client };
}

describe('createBackendStreamClient', () => {
  describe('openTurn', () => {
    it('posts the conversation and yields payloads in order', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({
        runId: 'run-42',
        payloads: [backendChunks.text('Hello'), backendChunks.done()],
      });

      const stream = await client.openTurn(
        {
          agentId: 'sgr_agent' as AgentId,
          messages: [{ role: 'user', content: 'Research solar output' }],
        },
        new AbortController().signal,
      );

      expect(stream.runId).toBe('run-42');
      expect(await collect(stream.payloads)).toEqual([backendChunks.text('Hello'), '[DONE]']);
      expect(backend.requests).toEqual([
        {
          method: 'POST',
          path: '/v1/chat/completions',
          body: {
            model: 'sgr_agent',
            messages: [{ role: 'user', content: 'Research solar output' }],
            stream: true,
          },
        },
      ]);
    });

    it('reports a missing run id header as null', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({ payloads: ['[DONE]'] });

      const stream = await client.openTurn(
        { agentId: 'sgr_agent' as AgentId, messages: [] },
        new AbortController().signal,
      );

      expect(stream.runId).toBeNull();
    });

    it('fails with kind upstream on a non-2xx status', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({ payloads: [], status: 500 });

      const promise = client.openTurn({ agentId: 'sgr_agent' as AgentId, messages: [] }, new AbortController().signal);

      await expect(promise).rejects.toBeInstanceOf(BackendStreamError);
      await expect(promise).rejects.toMatchObject({
        kind: 'upstream',
        message: 'Backend responded with HTTP 500',
      });
    });

    it('fails with kind unreachable when the connection is refused', async () => {
      const { backend, client } = setup();
      backend.setReachable(false);

      await expect(
        client.openTurn({ agentId: 'sgr_agent' as AgentId, messages: [] }, new AbortController().signal),
      ).rejects.toMatchObject({ kind: 'unreachable' });
    });
  });

  describe('stream failures', () => {
    it('reports a body failure before any payload as unreachable', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({ payloads: [], failAfter: new Error('socket hang up') });

      const stream = await client.openTurn(
        { agentId: 'sgr_agent' as AgentId, messages: [] },
        new AbortController().signal,
      );

      await expect(collect(stream.payloads)).rejects.toMatchObject({ kind: 'unreachable' });
    });

    it('reports a body failure after a payload as truncated', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({ payloads: [backendChunks.text('partial')], failAfter: new Error('socket hang up') });

      const stream = await client.openTurn(
        { agentId: 'sgr_agent' as AgentId, messages: [] },
        new AbortController().signal,
      );

      const seen: string[] = [];
      const reading = (async (): Promise<void> => {
        for await (const payload of stream.payloads) seen.push(payload);
      })();

      await expect(reading).rejects.toMatchObject({ kind: 'truncated' });
      expect(seen).toEqual([backendChunks.text('partial')]);
    });

    it('closes the backend connection when the signal is aborted', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({ payloads: [backendChunks.text('working')], hold: true });
      const abort = new AbortController();

      const stream = await client.openTurn({ agentId: 'sgr_agent' as AgentId, messages: [] }, abort.signal);
      const iterator = stream.payloads[Symbol.asyncIterator]();

      expect(await iterator.next()).toEqual({ done: false, value: backendChunks.text('working') });
      const pending = iterator.next();
      abort.abort();

      await expect(pending).rejects.toMatchObject({ kind: 'truncated' });
      expect(backend.abortedStreams()).toBe(1);
    });
  });

  describe('resumeTurn', () => {
    it('posts the clarification to the suspended run', async () => {
      const { backend, client } = setup();
      backend.enqueueTurn({ runId: 'run/7', payloads: ['[DONE]'] });

      const stream = await client.resumeTurn('run/7', 'The year 2024', new AbortController().signal);

      expect(await collect(stream.payloads)).toEqual(['[DONE]']);
      expect(backend.requests[0]).toEqual({
        method: 'POST',
        path: '/agents/run%2F7/provide_clarification',
        body: { clarifications: 'The year 2024' },
      });
    });
  });

  describe('listModels', () => {
    it('maps the model listing', async () => {
      const { backend, client } = setup();
      backend.setModels([
        { id: 'sgr_agent', owned_by: 'sgr' },
        { id: 'sgr_research_agent', capabilities: ['streaming'] },
      ]);

      expect(await client.listModels()).toEqual([
        { id: 'sgr_agent', ownedBy: 'sgr' },
        { id: 'sgr_research_agent', capabilities: ['streaming'] },
      ]);
    });

    it('fails with kind upstream when the listing errors', async () => {
      const { backend, client } = setup();
      backend.setModels(null);

      await expect(client.listModels()).rejects.toMatchObject({ kind: 'upstream' });
    });
  });

  describe('checkHealth', () => {
    it('is true for a 2xx answer', async () => {
      const { client } = setup();
      expect(await client.checkHealth()).toBe(true);
    });

    it('is false for an unhealthy or unreachable backend', async () => {
      const { backend, client } = setup();
      backend.setHealthy(false);
      expect(await client.checkHealth()).toBe(false);

      backend.setReachable(false);
      expect(await client.checkHealth()).toBe(false);
    });
  });
});
