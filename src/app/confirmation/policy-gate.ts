import type { Candidate } from '../../domain/loop/types.js';
import type { RiskTier } from '../../domain/risk/types.js';
import type { ConfirmationDecision, IConfirmationGate } from '../../domain/confirmation/types.js';
import { silentLogger, type Logger } from '../../infra/logging/logger.js';

/**
 * Answers every confirmation the same way, without a terminal.
 */
export class PolicyConfirmationGate implements IConfirmationGate {
  constructor(
    private readonly decision: ConfirmationDecision,
    private readonly logger: Logger = silentLogger
  ) {}

  async confirm(candidate: Candidate, tier: RiskTier): Promise<ConfirmationDecision> {
    this.logger.info(`[ConfirmationGate] Auto-${this.decision} ${tier} command`, { command: candidate.command });
    return this.decision;
  }
}

export function createApproveAllGate(logger?: Logger): IConfirmationGate {
  return new PolicyConfirmationGate('approved', logger);
}

export function createDeclineAllGate(logger?: Logger): IConfirmationGate {
  return new PolicyConfirmationGate('declined', logger);
}
