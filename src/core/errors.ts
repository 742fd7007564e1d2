/**
 * Base error class for all bridge errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class BridgeError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'BridgeError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when request validation fails outside of Zod parsing. */
export class ValidationError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a chained request references a session that cannot be resumed. */
export class SessionError extends BridgeError {
  constructor(message: string, sessionId: string, statusCode = 404) {
    super({
      message,
      code: 'SESSION_ERROR',
      statusCode,
      context: { sessionId },
    });
    this.name = 'SessionError';
  }
}

/** A backend payload matched none of the known event shapes. */
export class DecodeError extends BridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'DECODE_ERROR',
      statusCode: 502,
      context,
    });
    this.name = 'DecodeError';
  }
}

/** A well-formed backend event that contradicts the session's state (e.g. unmatched tool-call ids). */
export class ProtocolViolationError extends BridgeError {
  constructor(message: string, sessionId: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'PROTOCOL_VIOLATION',
      statusCode: 502,
      context: { sessionId, ...context },
    });
    this.name = 'ProtocolViolationError';
  }
}

/** Thrown when the agent list cannot be fetched and no cached copy exists. */
export class RegistryUnavailableError extends BridgeError {
  constructor(message: string, cause?: Error) {
    super({
      message: `Agent registry unavailable: ${message}`,
      code: 'REGISTRY_UNAVAILABLE',
      statusCode: 503,
      cause,
    });
    this.name = 'RegistryUnavailableError';
  }
}

/** Failure categories a backend connection can report. */
export type BackendFailureKind = 'unreachable' | 'truncated' | 'upstream';

/**
 * Thrown by the backend stream client. `unreachable` means no event was
 * delivered; `truncated` means the connection dropped after at least one.
 */
export class BackendStreamError extends BridgeError {
  public readonly kind: BackendFailureKind;

  constructor(
    kind: BackendFailureKind,
    message: string,
    cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super({
      message,
      code: `BACKEND_${kind.toUpperCase()}`,
      statusCode: 502,
      cause,
      context: { kind, ...context },
    });
    this.name = 'BackendStreamError';
    this.kind = kind;
  }
}

/** Returned to non-streaming callers when their turn ends in a failure. */
export class TurnFailedError extends BridgeError {
  constructor(kind: string, message: string, statusCode: number, sessionId: string) {
    super({
      message,
      code: kind.toUpperCase(),
      statusCode,
      context: { kind, sessionId },
    });
    this.name = 'TurnFailedError';
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
