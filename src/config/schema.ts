/**
 * Zod schemas for validating the bridge configuration.
 * Every field has a default so an empty environment yields a usable
 * local-development configuration.
 */
import { z } from 'zod';

const TRUE_STRINGS = new Set(['1', 'true', 'yes', 'on']);

/** Booleans arrive as strings from the environment; `z.coerce.boolean` would read "false" as true. */
const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? TRUE_STRINGS.has(value.trim().toLowerCase()) : value),
  z.boolean(),
);

// ─── Backend ────────────────────────────────────────────────────

/**
 * Schema for the research backend connection.
 */
export const backendConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('Invalid backend base URL format')
    .transform((url) => url.replace(/\/+$/, ''))
    .default('http://localhost:8010'),
  /** Maximum duration of one chat turn, in milliseconds. */
  requestTimeoutMs: z.coerce
    .number()
    .int()
    .positive('Request timeout must be a positive integer')
    .default(300_000),
  /** How long a cached backend liveness probe result stays valid. */
  healthCacheMs: z.coerce.number().int().min(0).default(5_000),
});

// ─── Output ─────────────────────────────────────────────────────

export const outputConfigSchema = z.object({
  /** Render backend tool invocations and results into the chat stream. */
  emitToolCalls: booleanFlag.default(true),
});

// ─── Agents ─────────────────────────────────────────────────────

/**
 * Schema for agent selection and registry caching.
 */
export const agentsConfigSchema = z.object({
  defaultAgentId: z.string().min(1, 'Default agent cannot be empty').default('sgr_tool_calling_agent'),
  /** Tool names the backend uses to ask the user a clarifying question. */
  clarificationToolNames: z
    .array(z.string().min(1))
    .min(1, 'At least one clarification tool name is required')
    .default(['clarificationtool']),
  /** Agents advertised by GET /v1/models until the backend list has been fetched. */
  fallbackAgentIds: z.array(z.string().min(1)).default(['sgr_tool_calling_agent', 'sgr_research_agent']),
  registryTtlMs: z.coerce.number().int().positive('Registry TTL must be a positive integer').default(60_000),
  /** Deadline for one backend model listing request. */
  registryTimeoutMs: z.coerce.number().int().positive().default(5_000),
});

// ─── Sessions ───────────────────────────────────────────────────

export const sessionsConfigSchema = z.object({
  /** How long a turn awaiting clarification can wait for the caller's answer. */
  clarificationTtlMs: z.coerce
    .number()
    .int()
    .positive('Clarification TTL must be a positive integer')
    .default(600_000),
});

// ─── Server ─────────────────────────────────────────────────────

export const serverConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65_535).default(9099),
  host: z.string().min(1).default('0.0.0.0'),
  /** Comma-separated list of allowed origins; unset allows any origin. */
  corsOrigin: z.string().min(1).optional(),
  rateLimitPerMinute: z.coerce.number().int().positive().default(100),
});

// ─── Bridge Config ──────────────────────────────────────────────

export const bridgeConfigSchema = z.object({
  backend: backendConfigSchema.default({}),
  output: outputConfigSchema.default({}),
  agents: agentsConfigSchema.default({}),
  sessions: sessionsConfigSchema.default({}),
  server: serverConfigSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

// ─── Inferred Types ─────────────────────────────────────────────

/** Raw configuration before defaults are applied. */
export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;
