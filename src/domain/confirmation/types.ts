/**
 * Confirmation Domain Types
 */

import type { Candidate } from '../loop/types.js';
import type { RiskTier } from '../risk/types.js';

export type ConfirmationDecision = 'approved' | 'declined';

/**
 * How risky candidates are confirmed:
 * - prompt: ask on the terminal
 * - approve: approve everything (unattended runs the user vouched for)
 * - decline: decline everything (deny by default)
 */
export type ConfirmationPolicy = 'prompt' | 'approve' | 'decline';

export interface ConfirmOptions {
  /** Aborting closes any open prompt and rejects with AbortError */
  signal?: AbortSignal;
}

export interface IConfirmationGate {
  confirm(candidate: Candidate, tier: RiskTier, options?: ConfirmOptions): Promise<ConfirmationDecision>;
}
