/**
 * Helpers that turn raw tool-call argument JSON into short,
 * human-readable text for the chat stream.
 */

/** Argument keys holding the agent's internal reasoning; never shown. */
const HIDDEN_ARGUMENT_KEYS = new Set(['reasoning', 'thought', 'plan', 'analysis']);

const MAX_ARGUMENT_VALUE_LENGTH = 100;
const MAX_SHOWN_ARGUMENTS = 3;

export const DEFAULT_CLARIFICATION_PROMPT = 'Could you clarify your request?';

/** Cut `text` to `max` characters, marking the cut with an ellipsis. */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function parseObject(rawArguments: string): Record<string, unknown> | null {
  if (rawArguments.trim() === '') return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawArguments);
  } catch {
    return null;
  }
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return null;
}

/**
 * Summarize tool arguments as `**key**: value | **key**: value`.
 * Reasoning fields are skipped, long values truncated, and at most
 * three arguments shown. Returns an empty string when the arguments
 * are not a JSON object.
 */
export function formatToolArguments(rawArguments: string): string {
  const args = parseObject(rawArguments);
  if (!args) return '';

  const parts: string[] = [];
  for (const [key, value] of Object.entries(args)) {
    if (HIDDEN_ARGUMENT_KEYS.has(key)) continue;
    const text = typeof value === 'string' ? value : JSON.stringify(value);
    parts.push(`**${key}**: ${truncate(text, MAX_ARGUMENT_VALUE_LENGTH)}`);
  }
  return parts.slice(0, MAX_SHOWN_ARGUMENTS).join(' | ');
}

/**
 * Build the question shown to the user from clarification tool arguments.
 * The backend's clarification tool carries a `questions` list; a single
 * `question` or `prompt` field is accepted too.
 */
export function clarificationPromptFrom(args: Record<string, unknown>): string {
  const questions = args['questions'];
  if (Array.isArray(questions)) {
    const lines = questions.filter(
      (q): q is string => typeof q === 'string' && q.trim() !== '',
    );
    if (lines.length > 0) return lines.join('\n');
  }

  const single = args['question'] ?? args['prompt'];
  if (typeof single === 'string' && single.trim() !== '') return single;

  return DEFAULT_CLARIFICATION_PROMPT;
}

/**
 * Same as {@link clarificationPromptFrom}, from the raw argument string.
 * Non-JSON arguments are shown as they are.
 */
export function extractClarificationPrompt(rawArguments: string): string {
  const args = parseObject(rawArguments);
  if (args) return clarificationPromptFrom(args);
  const raw = rawArguments.trim();
  return raw === '' ? DEFAULT_CLARIFICATION_PROMPT : raw;
}
