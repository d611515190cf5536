import type { LLMMessage, LLMResponse } from '../llm-provider.js';
import type {
  EndpointCredentials,
  ProtocolRequestConfig,
  RawApiResponse,
} from './protocol-adapter.js';
import { BaseProtocolAdapter, isRecord, joinUrl } from './protocol-adapter.js';

interface OpenAIChatRequest {
  model: string;
  messages: Array<{ role: LLMMessage['role']; content: string }>;
  max_tokens: number;
  temperature: number;
}

/**
 * OpenAI Chat Completions protocol adapter
 * Also serves every OpenAI-compatible endpoint (Gemini, Mistral, Groq, DeepSeek, ...)
 */
export class OpenAIProtocolAdapter extends BaseProtocolAdapter {
  readonly protocolId = 'openai' as const;

  formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): OpenAIChatRequest {
    return {
      model: config.model,
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      max_tokens: config.maxTokens || 1024,
      temperature: config.temperature ?? 0.2,
    };
  }

  parseResponse(response: RawApiResponse, model: string): LLMResponse {
    const data: Record<string, unknown> = isRecord(response.data) ? response.data : {};
    const choice: Record<string, unknown> = Array.isArray(data.choices) && isRecord(data.choices[0]) ? data.choices[0] : {};
    const rawContent = isRecord(choice.message) ? choice.message.content : undefined;

    let content: string | null = null;
    if (typeof rawContent === 'string') {
      content = rawContent;
    } else if (Array.isArray(rawContent)) {
      // Some compatible servers return content parts instead of a string
      content =
        rawContent.map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : '')).join('') ||
        null;
    }

    const totalTokens = isRecord(data.usage) ? data.usage.total_tokens : undefined;

    return {
      content,
      tokensUsed: typeof totalTokens === 'number' ? totalTokens : 0,
      model: typeof data.model === 'string' && data.model ? data.model : model,
      finishReason: this.mapFinishReason(typeof choice.finish_reason === 'string' ? choice.finish_reason : null),
    };
  }

  buildHeaders(credentials: EndpointCredentials): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (credentials.apiKey) {
      headers['Authorization'] = `Bearer ${credentials.apiKey}`;
    }

    return headers;
  }

  buildUrl(baseUrl: string, _model: string): string {
    return joinUrl(baseUrl, 'chat/completions');
  }
}

/**
 * Singleton instance
 */
let instance: OpenAIProtocolAdapter | null = null;

export function getOpenAIProtocol(): OpenAIProtocolAdapter {
  if (!instance) {
    instance = new OpenAIProtocolAdapter();
  }
  return instance;
}
