import type { HealthProbe } from '@/backend/health-probe.js';
import type { BackendStreamClient } from '@/backend/types.js';
import type { BridgeConfig } from '@/config/types.js';
import type { EventDecoder } from '@/events/decoder.js';
import type { Logger } from '@/observability/logger.js';
import type { AgentRegistry } from '@/registry/types.js';
import type { SessionStore } from '@/session/session-store.js';

// ─── OpenAI Error Envelope ───────────────────────────────────────

export interface ApiErrorBody {
  error: ApiError;
}

export interface ApiError {
  message: string;
  /** OpenAI error family, e.g. `invalid_request_error`. */
  type: string;
  code: string | null;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  config: BridgeConfig;
  agentRegistry: AgentRegistry;
  backendClient: BackendStreamClient;
  healthProbe: HealthProbe;
  sessionStore: SessionStore;
  decode: EventDecoder;
  logger: Logger;
}
