// Caller-facing output: SSE chunks or a collected non-streaming answer
export type {
  AccumulatedTurn,
  FragmentSink,
  ToolActivity,
  ToolActivityStatus,
  TurnOutcomeStatus,
} from './types.js';
export type { DeltaEmitterOptions } from './delta-emitter.js';
export { createDeltaEmitter, sseFrame, SSE_DONE_FRAME } from './delta-emitter.js';
export type { TurnAccumulator } from './turn-accumulator.js';
export { createTurnAccumulator } from './turn-accumulator.js';
export { renderFragment } from './markdown.js';
