/**
 * Markdown rendering of non-text fragments, so tool activity and
 * clarification prompts show up inside the chat message itself.
 */
import { formatToolArguments, truncate } from '@/events/tool-arguments.js';
import type { OpenToolCall, OutputFragment, ToolAnnotation } from '@/session/types.js';

const MAX_RESULT_LENGTH = 200;

function renderAnnotation(annotation: ToolAnnotation): string {
  if (annotation.stage === 'started') {
    const args = formatToolArguments(annotation.arguments);
    return `\n\n> **Tool:** ${annotation.toolName}\n` + (args ? `> ${args}\n\n` : '\n');
  }
  const result = annotation.result.replace(/\s+/g, ' ').trim();
  return `> **Result:** ${result === '' ? 'done' : truncate(result, MAX_RESULT_LENGTH)}\n\n`;
}

function renderIncomplete(calls: readonly OpenToolCall[]): string {
  if (calls.length === 0) return '';
  return `\n\n> **Incomplete tool activity:** ${calls.map((c) => c.toolName).join(', ')}\n`;
}

/** Content text for one fragment; empty when the fragment adds no visible text. */
export function renderFragment(fragment: OutputFragment): string {
  switch (fragment.kind) {
    case 'text':
      return fragment.text;
    case 'tool_annotation':
      return renderAnnotation(fragment.annotation);
    case 'control': {
      const control = fragment.control;
      switch (control.type) {
        case 'clarification':
          return `\n\n**Clarification needed:**\n\n${control.prompt}\n`;
        case 'completed':
          return control.trailingText + renderIncomplete(control.incompleteToolCalls);
        case 'failed':
          return renderIncomplete(control.incompleteToolCalls) + `\n\n**Error:** ${control.message}\n`;
      }
    }
  }
}
