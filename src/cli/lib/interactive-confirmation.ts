import inquirer from 'inquirer';
import type { Candidate } from '../../domain/loop/types.js';
import type { RiskTier } from '../../domain/risk/types.js';
import type { ConfirmationDecision, ConfirmOptions, IConfirmationGate } from '../../domain/confirmation/types.js';
import { throwIfAborted, withAbortSignal } from '../../app/execution/abort-signals.js';
import { formatCandidate } from './render.js';

export type ConfirmPrompt = (message: string, signal?: AbortSignal) => Promise<boolean>;

async function inquirerConfirm(message: string, signal?: AbortSignal): Promise<boolean> {
  throwIfAborted(signal);

  const prompt = inquirer.prompt<{ approved: boolean }>([
    {
      type: 'confirm',
      name: 'approved',
      message,
      default: false,
    },
  ]);
  // Releases the terminal; the prompt promise itself never settles after this.
  const close = () => prompt.ui.close();
  signal?.addEventListener('abort', close, { once: true });

  try {
    const { approved } = await withAbortSignal(prompt, signal);
    return approved;
  } finally {
    signal?.removeEventListener('abort', close);
  }
}

/**
 * Shows the candidate with its tier and asks yes/no, defaulting to No.
 */
export class InteractiveConfirmationGate implements IConfirmationGate {
  constructor(
    private readonly ask: ConfirmPrompt = inquirerConfirm,
    private readonly write: (text: string) => void = (text) => process.stderr.write(text)
  ) {}

  async confirm(candidate: Candidate, tier: RiskTier, options: ConfirmOptions = {}): Promise<ConfirmationDecision> {
    this.write(`${formatCandidate(candidate, tier)}\n`);
    const message = tier === 'dangerous' ? 'This command is destructive. Run it anyway?' : 'Run this command?';
    return (await this.ask(message, options.signal)) ? 'approved' : 'declined';
  }
}
