import { describe, it, expect } from 'vitest';
import type { ToolCallId } from '@/core/types.js';
import { createTurnAccumulator } from './turn-accumulator.js';

const SEARCH = '1' as ToolCallId;
const FETCH = '2' as ToolCallId;

describe('createTurnAccumulator', () => {
  it('assembles text and tool activity for a completed turn', async () => {
    const accumulator = createTurnAccumulator();

    await accumulator.write({
      kind: 'tool_annotation',
      annotation: { stage: 'started', callId: SEARCH, toolName: 'search', arguments: '{"q":"solar"}' },
      sequence: 0,
      isFinal: false,
    });
    await accumulator.write({
      kind: 'tool_annotation',
      annotation: { stage: 'finished', callId: SEARCH, toolName: 'search', result: '3 hits' },
      sequence: 1,
      isFinal: false,
    });
    await accumulator.write({
      kind: 'tool_annotation',
      annotation: { stage: 'started', callId: FETCH, toolName: 'fetch', arguments: '{}' },
      sequence: 2,
      isFinal: false,
    });
    await accumulator.write({ kind: 'text', text: 'Found 3', sequence: 3, isFinal: false });
    await accumulator.write({
      kind: 'control',
      control: {
        type: 'completed',
        trailingText: ' results',
        incompleteToolCalls: [{ callId: FETCH, toolName: 'fetch', startedAt: new Date(0) }],
      },
      sequence: 4,
      isFinal: true,
    });
    await accumulator.finish();

    expect(accumulator.result()).toEqual({
      status: 'completed',
      text: 'Found 3 results',
      clarificationPrompt: null,
      failure: null,
      toolActivity: [
        { callId: '1', toolName: 'search', arguments: '{"q":"solar"}', result: '3 hits', status: 'completed' },
        { callId: '2', toolName: 'fetch', arguments: '{}', result: null, status: 'incomplete' },
      ],
    });
  });

  it('reports a pending clarification', async () => {
    const accumulator = createTurnAccumulator();

    await accumulator.write({
      kind: 'control',
      control: { type: 'clarification', prompt: 'Which year?' },
      sequence: 0,
      isFinal: false,
    });

    expect(accumulator.result()).toMatchObject({
      status: 'awaiting_clarification',
      clarificationPrompt: 'Which year?',
      text: '',
    });
  });

  it('reports a failure with its user-safe message', async () => {
    const accumulator = createTurnAccumulator();

    await accumulator.write({ kind: 'text', text: 'partial', sequence: 0, isFinal: false });
    await accumulator.write({
      kind: 'control',
      control: { type: 'failed', kind: 'truncated', message: 'interrupted', incompleteToolCalls: [] },
      sequence: 1,
      isFinal: true,
    });

    expect(accumulator.result()).toMatchObject({
      status: 'failed',
      text: 'partial',
      failure: { kind: 'truncated', message: 'interrupted' },
    });
  });
});
