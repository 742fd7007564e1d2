// Backend event stream decoding
export type {
  AgentEvent,
  AgentEventType,
  ClarificationRequestedEvent,
  DecodedPayload,
  StreamErrorEvent,
  StreamErrorKind,
  TextDeltaEvent,
  ToolCallChunkEvent,
  ToolCallFinishedEvent,
  ToolCallStartedEvent,
  TurnCompletedEvent,
} from './types.js';

export type { EventDecoder } from './decoder.js';
export { decodePayload, DONE_SENTINEL } from './decoder.js';
export type { ToolCallAssembler, ToolCallAssemblerOptions } from './tool-call-assembler.js';
export { createToolCallAssembler } from './tool-call-assembler.js';
export {
  clarificationPromptFrom,
  DEFAULT_CLARIFICATION_PROMPT,
  extractClarificationPrompt,
  formatToolArguments,
  truncate,
} from './tool-arguments.js';
