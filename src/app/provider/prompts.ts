import type { HostInfo } from '../../infra/shell/system-info.js';

export interface SystemPromptContext {
  host: HostInfo;
  /** Language for the rationale */
  language: string;
}

const RESPONSE_FORMAT = [
  'Reply with exactly one JSON object and nothing else:',
  '{"command": "<shell command>", "rationale": "<one sentence>", "dangerous": <true|false>}',
].join('\n');

const RULES = [
  '- "command" is a single command line that can run as-is in the shell above.',
  '- Never use interactive programs or commands that wait for input (editors, pagers, prompts).',
  '- Prefer read-only commands when the request allows it.',
  '- Set "dangerous" to true when the command deletes, overwrites or changes system state.',
  '- When previous attempts are listed, propose a different command that avoids their errors.',
];

function hostSection(host: HostInfo): string {
  return [
    'Environment:',
    `- OS: ${host.osName} ${host.release} (${host.arch})`,
    `- Shell: ${host.shell}`,
    `- Working directory: ${host.cwd}`,
    `- User: ${host.user}`,
  ].join('\n');
}

export function buildSystemPrompt(context: SystemPromptContext): string {
  return [
    'You translate requests written in natural language into shell commands.',
    hostSection(context.host),
    RESPONSE_FORMAT,
    ['Rules:', ...RULES, `- Write "rationale" in ${context.language}.`].join('\n'),
  ].join('\n\n');
}
