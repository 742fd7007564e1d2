/**
 * Factories for route and component tests.
 * Dependencies are real components wired to an in-process fake backend,
 * with a silent mock logger.
 */
import { vi } from 'vitest';
import type { RouteDependencies } from '@/api/types.js';
import { createHealthProbe } from '@/backend/health-probe.js';
import { createBackendStreamClient } from '@/backend/stream-client.js';
import { bridgeConfigSchema } from '@/config/schema.js';
import type { BridgeConfigInput } from '@/config/schema.js';
import type { BridgeConfig } from '@/config/types.js';
import { decodePayload } from '@/events/decoder.js';
import type { Logger } from '@/observability/logger.js';
import { createAgentRegistry } from '@/registry/agent-registry.js';
import { createSessionStore } from '@/session/session-store.js';
import { createFakeBackend } from '../helpers/fake-backend.js';
import type { FakeBackend } from '../helpers/fake-backend.js';

export const TEST_BACKEND_URL = 'http://backend.test';

/** Create a silent mock Logger. */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/** Validated config with defaults; nested overrides replace whole sections. */
export function createTestConfig(overrides: BridgeConfigInput = {}): BridgeConfig {
  return bridgeConfigSchema.parse({
    ...overrides,
    backend: { baseUrl: TEST_BACKEND_URL, ...overrides.backend },
  });
}

/** Assemble a complete RouteDependencies against a fake backend. */
export function createMockDeps(overrides: BridgeConfigInput = {}): RouteDependencies & {
  backend: FakeBackend;
} {
  const config = createTestConfig(overrides);
  const backend = createFakeBackend();
  const logger = createMockLogger();
  const backendClient = createBackendStreamClient({
    baseUrl: config.backend.baseUrl,
    logger,
    fetchImpl: backend.fetch,
  });

  return {
    backend,
    config,
    backendClient,
    agentRegistry: createAgentRegistry({
      client: backendClient,
      logger,
      defaultAgentId: config.agents.defaultAgentId,
      fallbackAgentIds: config.agents.fallbackAgentIds,
      cacheTtlMs: config.agents.registryTtlMs,
      listTimeoutMs: config.agents.registryTimeoutMs,
    }),
    healthProbe: createHealthProbe({ client: backendClient, cacheMs: config.backend.healthCacheMs }),
    sessionStore: createSessionStore({ clarificationTtlMs: config.sessions.clarificationTtlMs, logger }),
    decode: decodePayload,
    logger,
  };
}
