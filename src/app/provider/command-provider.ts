import type { Candidate, IProviderClient, ProposeOptions } from '../../domain/loop/types.js';
import type { ILLMProvider } from '../../infra/llm/llm-provider.js';
import type { HostInfo } from '../../infra/shell/system-info.js';
import { silentLogger, type Logger } from '../../infra/logging/logger.js';
import { buildSystemPrompt } from './prompts.js';
import { parseCandidate } from './response-parser.js';

export interface CommandProviderConfig {
  llm: ILLMProvider;
  host: HostInfo;
  language: string;
  /** Per-request timeout in ms */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Asks the configured model for one candidate command per prompt.
 */
export class CommandProviderClient implements IProviderClient {
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(private readonly config: CommandProviderConfig) {
    this.systemPrompt = buildSystemPrompt({ host: config.host, language: config.language });
    this.logger = config.logger ?? silentLogger;
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  async propose(prompt: string, options: ProposeOptions = {}): Promise<Candidate> {
    const response = await this.config.llm.complete(
      [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: prompt },
      ],
      { signal: options.signal, timeout: this.config.timeoutMs }
    );

    this.logger.debug('[CommandProvider] Raw response', {
      provider: this.config.llm.getName(),
      model: response.model,
      tokensUsed: response.tokensUsed,
      finishReason: response.finishReason,
    });

    return parseCandidate(response.content, this.config.llm.getName());
  }
}
