import * as path from 'path';
import type { Candidate } from '../../domain/loop/types.js';
import {
  maxRiskTier,
  type CompiledRiskPattern,
  type IRiskClassifier,
  type RiskAssessment,
  type RiskMatch,
  type RiskTier,
} from '../../domain/risk/types.js';
import { loadRiskPatterns, type RiskTableOptions } from './risk-table-loader.js';

const SEGMENT_SEPARATOR = /\|\||&&|;|\||\n|`|\$\(|\)|&/;

/** Words that run another program; the program after them is inspected too */
const WRAPPERS = new Set(['sudo', 'doas', 'env', 'command', 'nohup', 'time', 'nice', 'xargs', 'exec', 'builtin']);

/** Shells whose `-c` argument is itself a command line */
const SHELLS = new Set(['sh', 'bash', 'zsh', 'dash', 'ksh', 'fish']);

/** Builtins that run their arguments as a command line */
const EVALUATORS = new Set(['eval']);

const COMMAND_STRING_FLAG = /^-[A-Za-z]*c[A-Za-z]*$/;

const GROUPING_TOKENS = new Set(['(', '{', '!', 'then', 'do', 'else']);

const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

export function splitSegments(command: string): string[] {
  return command
    .split(SEGMENT_SEPARATOR)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function unquote(text: string): string {
  return text.trim().replace(/^['"]+|['"]+$/g, '');
}

function nestedPrograms(tokens: string[]): string[] {
  return splitSegments(unquote(tokens.join(' '))).flatMap(extractPrograms);
}

/**
 * Programs run by `sh -c "<command line>"`; tokens start after the shell name.
 * Without `-c` the shell runs a script file, which is not inspected.
 */
function shellCommandPrograms(tokens: string[]): string[] {
  let i = 0;
  while (i < tokens.length && /^[-+]/.test(tokens[i])) {
    const option = tokens[i];
    i++;
    if (COMMAND_STRING_FLAG.test(option)) {
      return nestedPrograms(tokens.slice(i));
    }
    if (option === '-o' || option === '+o') {
      i++;
    }
  }
  return [];
}

/**
 * Program names of one segment: every wrapper, then the program they run.
 * `sudo -E FOO=1 /bin/rm -rf x` gives ['sudo', 'rm'];
 * `bash -c "rm -rf x"` and `eval rm -rf x` give the shell or eval, then 'rm'.
 */
export function extractPrograms(segment: string): string[] {
  const tokens = segment.split(/\s+/).filter(Boolean);
  const programs: string[] = [];

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i].replace(/^['"]|['"]$/g, '');
    if (ASSIGNMENT.test(token) || GROUPING_TOKENS.has(token)) {
      i++;
      continue;
    }

    const name = path.posix.basename(token).toLowerCase();
    programs.push(name);
    if (SHELLS.has(name)) {
      programs.push(...shellCommandPrograms(tokens.slice(i + 1)));
      break;
    }
    if (EVALUATORS.has(name)) {
      programs.push(...nestedPrograms(tokens.slice(i + 1)));
      break;
    }
    if (!WRAPPERS.has(name)) break;

    i++;
    while (i < tokens.length && (tokens[i].startsWith('-') || /^\d+$/.test(tokens[i]))) {
      i++;
    }
  }

  return programs;
}

export class RiskClassifier implements IRiskClassifier {
  constructor(private readonly patterns: readonly CompiledRiskPattern[]) {}

  classify(candidate: Candidate): RiskTier {
    return this.assess(candidate).tier;
  }

  assess(candidate: Candidate): RiskAssessment {
    const command = candidate.command;
    const programs = new Set(splitSegments(command).flatMap(extractPrograms));
    const matches: RiskMatch[] = [];

    for (const entry of this.patterns) {
      const programMatch =
        entry.programs.size === 0 || [...entry.programs].some((program) => programs.has(program));
      if (!programMatch) continue;
      if (entry.regex && !entry.regex.test(command)) continue;
      matches.push({ id: entry.id, tier: entry.tier, description: entry.description });
    }

    let tier: RiskTier = matches.reduce<RiskTier>((acc, match) => maxRiskTier(acc, match.tier), 'safe');

    if (candidate.dangerous === true && tier === 'safe') {
      tier = 'caution';
      matches.push({ id: 'provider_hint', tier: 'caution', description: 'Flagged as risky by the model' });
    }

    return { tier, matches };
  }
}

export function createRiskClassifier(options: RiskTableOptions = {}): RiskClassifier {
  return new RiskClassifier(loadRiskPatterns(options));
}
