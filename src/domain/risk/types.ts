/**
 * Risk Domain Types
 *
 * Three tiers, ordered from least to most confirmation:
 * - safe: runs without asking
 * - caution: state-mutating but recoverable, asks first
 * - dangerous: destructive or hard to undo, asks first
 */

import type { Candidate } from '../loop/types.js';

export type RiskTier = 'safe' | 'caution' | 'dangerous';

export const RISK_TIER_ORDER: readonly RiskTier[] = ['safe', 'caution', 'dangerous'];

export type RiskCategory =
  | 'filesystem'
  | 'disk'
  | 'permissions'
  | 'process'
  | 'service'
  | 'network'
  | 'package'
  | 'git'
  | 'system'
  | 'privilege';

/**
 * Pattern entry as stored in the JSON table.
 * An entry needs `programs`, `pattern`, or both; with both, both must match.
 */
export interface RiskPatternDefinition {
  id: string;
  tier: Exclude<RiskTier, 'safe'>;
  category: RiskCategory;
  description: string;
  /** Program names matched against the first word of each command segment */
  programs?: string[];
  /** Case-insensitive regular expression source matched against the whole command */
  pattern?: string;
  examples?: string[];
}

export interface RiskPatternTable {
  version: 1;
  patterns: RiskPatternDefinition[];
}

/**
 * Pattern entry ready for matching
 */
export interface CompiledRiskPattern {
  id: string;
  tier: Exclude<RiskTier, 'safe'>;
  category: RiskCategory;
  description: string;
  programs: ReadonlySet<string>;
  regex?: RegExp;
}

export interface RiskMatch {
  id: string;
  tier: Exclude<RiskTier, 'safe'>;
  description: string;
}

export interface RiskAssessment {
  tier: RiskTier;
  matches: RiskMatch[];
}

export function compareRiskTiers(a: RiskTier, b: RiskTier): number {
  return RISK_TIER_ORDER.indexOf(a) - RISK_TIER_ORDER.indexOf(b);
}

export function maxRiskTier(a: RiskTier, b: RiskTier): RiskTier {
  return compareRiskTiers(a, b) >= 0 ? a : b;
}

export function requiresConfirmation(tier: RiskTier): boolean {
  return tier !== 'safe';
}

/**
 * Pure and deterministic: the same candidate always gets the same tier.
 */
export interface IRiskClassifier {
  classify(candidate: Candidate): RiskTier;
}
