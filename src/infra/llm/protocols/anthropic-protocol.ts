import type { LLMMessage, LLMResponse } from '../llm-provider.js';
import type {
  EndpointCredentials,
  ProtocolRequestConfig,
  RawApiResponse,
} from './protocol-adapter.js';
import { BaseProtocolAdapter, isRecord, joinUrl } from './protocol-adapter.js';

interface AnthropicMessagesRequest {
  model: string;
  messages: Array<{ role: 'user' | 'assistant'; content: string }>;
  system?: string;
  max_tokens: number;
  temperature: number;
}

function countTokens(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/**
 * Anthropic Messages API protocol adapter
 */
export class AnthropicProtocolAdapter extends BaseProtocolAdapter {
  readonly protocolId = 'anthropic' as const;

  formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): AnthropicMessagesRequest {
    // System prompt travels outside the message list
    const system = messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const requestBody: AnthropicMessagesRequest = {
      model: config.model,
      messages: messages
        .filter(m => m.role !== 'system')
        .map(m => ({
          role: m.role === 'assistant' ? 'assistant' : 'user',
          content: m.content,
        })),
      max_tokens: config.maxTokens || 1024,
      temperature: config.temperature ?? 0.2,
    };

    if (system) {
      requestBody.system = system;
    }

    return requestBody;
  }

  parseResponse(response: RawApiResponse, model: string): LLMResponse {
    const data: Record<string, unknown> = isRecord(response.data) ? response.data : {};

    let content = '';
    if (Array.isArray(data.content)) {
      for (const block of data.content) {
        if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
          content += block.text;
        }
      }
    }

    const usage: Record<string, unknown> = isRecord(data.usage) ? data.usage : {};
    const tokensUsed = countTokens(usage.input_tokens) + countTokens(usage.output_tokens);

    return {
      content: content || null,
      tokensUsed,
      model: typeof data.model === 'string' && data.model ? data.model : model,
      finishReason: this.mapFinishReason(typeof data.stop_reason === 'string' ? data.stop_reason : null),
    };
  }

  buildHeaders(credentials: EndpointCredentials): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'anthropic-version': '2023-06-01',
    };

    if (credentials.apiKey) {
      headers['x-api-key'] = credentials.apiKey;
    }

    return headers;
  }

  buildUrl(baseUrl: string, _model: string): string {
    return joinUrl(baseUrl, 'messages');
  }
}

/**
 * Singleton instance
 */
let instance: AnthropicProtocolAdapter | null = null;

export function getAnthropicProtocol(): AnthropicProtocolAdapter {
  if (!instance) {
    instance = new AnthropicProtocolAdapter();
  }
  return instance;
}
