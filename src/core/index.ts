// Core module — shared types, Result, and the error hierarchy
export type {
  AgentCapability,
  AgentDescriptor,
  AgentId,
  ChatMessage,
  ChatRole,
  ChatTurnRequest,
  SessionId,
  ToolCallId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  BridgeError,
  ValidationError,
  SessionError,
  DecodeError,
  ProtocolViolationError,
  RegistryUnavailableError,
  BackendStreamError,
  TurnFailedError,
  toError,
} from './errors.js';
export type { BackendFailureKind } from './errors.js';
