import 'dotenv/config';
import { createServer } from '@/api/server.js';
import type { RouteDependencies } from '@/api/types.js';
import { createBackendStreamClient } from '@/backend/stream-client.js';
import { createHealthProbe } from '@/backend/health-probe.js';
import { loadBridgeConfig } from '@/config/loader.js';
import { decodePayload } from '@/events/decoder.js';
import { createLogger } from '@/observability/logger.js';
import { createAgentRegistry } from '@/registry/agent-registry.js';
import { createSessionStore } from '@/session/session-store.js';

const SWEEP_INTERVAL_MS = 30_000;

async function start(): Promise<void> {
  const configResult = await loadBridgeConfig({ filePath: process.env['BRIDGE_CONFIG_FILE'] });
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration', {
      component: 'main',
      error: configResult.error.message,
      ...configResult.error.context,
    });
    process.exit(1);
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel });

  try {
    const backendClient = createBackendStreamClient({ baseUrl: config.backend.baseUrl, logger });
    const agentRegistry = createAgentRegistry({
      client: backendClient,
      logger,
      defaultAgentId: config.agents.defaultAgentId,
      fallbackAgentIds: config.agents.fallbackAgentIds,
      cacheTtlMs: config.agents.registryTtlMs,
      listTimeoutMs: config.agents.registryTimeoutMs,
    });
    const healthProbe = createHealthProbe({ client: backendClient, cacheMs: config.backend.healthCacheMs });
    const sessionStore = createSessionStore({
      clarificationTtlMs: config.sessions.clarificationTtlMs,
      logger,
    });

    // Warm the agent list; a backend that is still starting is not fatal
    try {
      const agents = await agentRegistry.refresh();
      logger.info('Agent registry loaded', { component: 'main', agents: agents.map((a) => a.id) });
    } catch (error: unknown) {
      logger.warn('Agent registry not loaded at startup', {
        component: 'main',
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const deps: RouteDependencies = {
      config,
      agentRegistry,
      backendClient,
      healthProbe,
      sessionStore,
      decode: decodePayload,
      logger,
    };

    const server = await createServer({ deps });

    const sweeper = setInterval(() => {
      sessionStore.sweepExpired();
    }, SWEEP_INTERVAL_MS);
    sweeper.unref();

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      clearInterval(sweeper);
      const cancelled = sessionStore.cancelAll();
      if (cancelled > 0) {
        logger.info('Cancelled in-flight turns', { component: 'main', cancelled });
      }
      await server.close();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Server listening on ${config.server.host}:${config.server.port}`, {
      component: 'main',
      backend: config.backend.baseUrl,
      emitToolCalls: config.output.emitToolCalls,
    });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
