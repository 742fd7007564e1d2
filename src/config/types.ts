import type { z } from 'zod';
import type { bridgeConfigSchema } from './schema.js';

// ─── Bridge Configuration ───────────────────────────────────────

/**
 * Validated configuration handed to the core. Components receive the
 * slices they need; none of them read the environment themselves.
 */
export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;

export type BackendConfig = BridgeConfig['backend'];
export type OutputConfig = BridgeConfig['output'];
export type AgentsConfig = BridgeConfig['agents'];
export type SessionsConfig = BridgeConfig['sessions'];
export type ServerConfig = BridgeConfig['server'];
