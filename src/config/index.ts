// ─── Types ──────────────────────────────────────────────────────
export type {
  AgentsConfig,
  BackendConfig,
  BridgeConfig,
  OutputConfig,
  ServerConfig,
  SessionsConfig,
} from './types.js';
export type { BridgeConfigInput } from './schema.js';

// ─── Schemas ────────────────────────────────────────────────────
export {
  agentsConfigSchema,
  backendConfigSchema,
  bridgeConfigSchema,
  outputConfigSchema,
  serverConfigSchema,
  sessionsConfigSchema,
} from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadBridgeConfig, readEnvOverlay, resolveEnvVars } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
