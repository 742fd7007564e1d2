export type { AgentRegistry } from './types.js';
export {
  createAgentRegistry,
  DEFAULT_CAPABILITIES,
  displayNameFor,
  normalizeModelId,
} from './agent-registry.js';
