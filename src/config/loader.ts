/**
 * Configuration loader — reads an optional JSON config file, resolves
 * `${VAR}` placeholders, overlays environment variables and validates
 * the result with Zod.
 */
import { readFile } from 'node:fs/promises';

import { BridgeError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { bridgeConfigSchema } from './schema.js';
import type { BridgeConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

type Env = Record<string, string | undefined>;

/**
 * Recursively resolves `${VAR_NAME}` placeholders in a JSON value.
 * Only whole-string placeholders are replaced.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Environment Overlay ────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Drop undefined leaves so they don't shadow file values during the merge. */
function compact(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(section).filter(([, v]) => v !== undefined));
}

function splitList(value: string | undefined): string[] | undefined {
  return value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Map environment variables onto the config shape. Values stay strings;
 * the schema coerces them.
 */
export function readEnvOverlay(env: Env): Record<string, unknown> {
  const timeoutSeconds = env['REQUEST_TIMEOUT_SECONDS'];
  const clarificationTools = env['CLARIFICATION_TOOLS'];
  const fallbackAgents = env['FALLBACK_AGENTS'];

  return {
    backend: compact({
      baseUrl: env['AGENT_API_BASE_URL'],
      requestTimeoutMs:
        timeoutSeconds !== undefined ? Number(timeoutSeconds) * 1000 : undefined,
      healthCacheMs: env['HEALTH_CACHE_MS'],
    }),
    output: compact({
      emitToolCalls: env['EMIT_TOOL_CALLS'],
    }),
    agents: compact({
      defaultAgentId: env['DEFAULT_AGENT'],
      clarificationToolNames: splitList(clarificationTools),
      fallbackAgentIds: splitList(fallbackAgents),
      registryTtlMs: env['REGISTRY_TTL_MS'],
      registryTimeoutMs: env['REGISTRY_TIMEOUT_MS'],
    }),
    sessions: compact({
      clarificationTtlMs: env['CLARIFICATION_TTL_MS'],
    }),
    server: compact({
      port: env['PORT'],
      host: env['HOST'],
      corsOrigin: env['CORS_ORIGIN'],
      rateLimitPerMinute: env['RATE_LIMIT_PER_MINUTE'],
    }),
    ...compact({ logLevel: env['LOG_LEVEL'] }),
  };
}

/** Two-level merge: environment sections override file sections key by key. */
function mergeSections(
  base: Record<string, unknown>,
  overlay: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return merged;
}

// ─── Configuration Loader ───────────────────────────────────────

export interface LoadConfigOptions {
  env?: Env;
  /** Optional JSON file; environment variables override its values. */
  filePath?: string;
}

async function readConfigFile(
  filePath: string,
  env: Env,
): Promise<Result<Record<string, unknown>, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = isRecord(error) && typeof error['code'] === 'string' ? error['code'] : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return err(error);
    }
    return err(
      new ConfigError('Failed to resolve environment variables', {
        filePath,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  if (!isRecord(resolved)) {
    return err(new ConfigError('Configuration file must contain a JSON object', { filePath }));
  }
  return ok(resolved);
}

/**
 * Loads and validates the bridge configuration.
 *
 * 1. Reads the optional JSON file and resolves its placeholders
 * 2. Overlays environment variables
 * 3. Validates against the Zod schema, applying defaults
 */
export async function loadBridgeConfig(
  options: LoadConfigOptions = {},
): Promise<Result<BridgeConfig, ConfigError>> {
  const env = options.env ?? process.env;

  let fromFile: Record<string, unknown> = {};
  if (options.filePath !== undefined) {
    const fileResult = await readConfigFile(options.filePath, env);
    if (!fileResult.ok) return fileResult;
    fromFile = fileResult.value;
  }

  const validation = bridgeConfigSchema.safeParse(
    mergeSections(fromFile, readEnvOverlay(env)),
  );
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(
      new ConfigError('Configuration validation failed', {
        filePath: options.filePath,
        issues,
      }),
    );
  }

  return ok(validation.data);
}
