// Per-turn session lifecycle
export type {
  CancelReason,
  ControlFragment,
  ControlPayload,
  OpenToolCall,
  OutputFragment,
  SessionPhase,
  SessionSnapshot,
  TextFragment,
  ToolAnnotation,
  ToolAnnotationFragment,
} from './types.js';
export { isTerminalPhase } from './types.js';

export type { SessionStateMachine, SessionStateMachineOptions } from './state-machine.js';
export { createSessionStateMachine, FAILURE_MESSAGES } from './state-machine.js';

export type { TurnController, TurnControllerOptions } from './turn-controller.js';
export { createTurnController } from './turn-controller.js';

export type { RunTurnParams, TurnOutcome, TurnSource } from './turn-runner.js';
export { runTurn } from './turn-runner.js';

export type {
  ActiveTurn,
  CancelOutcome,
  SessionState,
  SessionStore,
  SessionStoreOptions,
  SessionView,
  SuspendedSession,
} from './session-store.js';
export { createSessionStore } from './session-store.js';
