// Research backend access (HTTP + SSE)
export type {
  BackendModel,
  BackendStreamClient,
  BackendTurnRequest,
  BackendTurnStream,
  FetchFn,
} from './types.js';

export type { BackendStreamClientOptions } from './stream-client.js';
export { createBackendStreamClient } from './stream-client.js';
export type { SseParser } from './sse-parser.js';
export { createSseParser } from './sse-parser.js';
export type { BackendHealth, HealthProbe, HealthProbeOptions } from './health-probe.js';
export { createHealthProbe } from './health-probe.js';
