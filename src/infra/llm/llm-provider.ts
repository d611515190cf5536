export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string | null;
  tokensUsed: number;
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

export interface LLMRequestOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Request timeout in ms */
  timeout?: number;
  signal?: AbortSignal;
}

export interface ILLMProvider {
  complete(messages: LLMMessage[], options?: LLMRequestOptions): Promise<LLMResponse>;
  getName(): string;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public recoverable: boolean = true,
    public status?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
