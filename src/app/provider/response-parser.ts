import type { Candidate } from '../../domain/loop/types.js';
import { ProviderError } from '../../infra/llm/llm-provider.js';

const FENCE = /```[\w+-]*[ \t]*\r?\n?([\s\S]*?)```/g;

function normalizeCommand(raw: string): string {
  return raw.trim().replace(/^\$\s+/, '').trim();
}

function stripFences(text: string): string {
  return text.replace(/```[\w+-]*/g, '');
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

/**
 * JSON object anywhere in the text: inside a fence or surrounded by prose.
 * Returns undefined when no object with a `command` key parses; throws when that key is empty.
 */
function parseJsonCandidate(text: string, provider: string): Candidate | undefined {
  const unfenced = stripFences(text);
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced.slice(start, end + 1));
  } catch {
    return undefined;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed) || !('command' in parsed)) {
    return undefined;
  }

  const command = typeof parsed.command === 'string' ? normalizeCommand(parsed.command) : '';
  if (!command) {
    throw new ProviderError('Model response has no "command" field', provider, true);
  }

  const rationale =
    ('rationale' in parsed ? optionalString(parsed.rationale) : undefined) ??
    ('explanation' in parsed ? optionalString(parsed.explanation) : undefined);
  const dangerous =
    ('dangerous' in parsed ? optionalBoolean(parsed.dangerous) : undefined) ??
    ('is_dangerous' in parsed ? optionalBoolean(parsed.is_dangerous) : undefined);

  return { command, rationale, dangerous };
}

/**
 * Extract a candidate from raw model text.
 * Tries a JSON object, then a single fenced code block, then a single bare line.
 */
export function parseCandidate(text: string | null, provider: string): Candidate {
  const trimmed = (text ?? '').trim();
  if (!trimmed) {
    throw new ProviderError('Model returned an empty response', provider, true);
  }

  const fromJson = parseJsonCandidate(trimmed, provider);
  if (fromJson) return fromJson;

  const blocks = [...trimmed.matchAll(FENCE)].map((match) => normalizeCommand(match[1]));
  if (blocks.length === 1 && blocks[0]) {
    return { command: blocks[0] };
  }

  if (!trimmed.includes('\n') && !trimmed.includes('```')) {
    const command = normalizeCommand(trimmed);
    if (command) return { command };
  }

  throw new ProviderError('Could not find a command in the model response', provider, true);
}
