import {
  AnthropicProtocolAdapter,
  getAnthropicProtocol,
} from '../../../../src/infra/llm/protocols/anthropic-protocol.js';
import { getProtocolAdapter } from '../../../../src/infra/llm/protocols/index.js';
import type { LLMMessage } from '../../../../src/infra/llm/llm-provider.js';

describe('AnthropicProtocolAdapter', () => {
  let adapter: AnthropicProtocolAdapter;

  beforeEach(() => {
    adapter = new AnthropicProtocolAdapter();
  });

  it('should have the anthropic protocol id', () => {
    expect(adapter.protocolId).toBe('anthropic');
  });

  describe('formatRequest', () => {
    it('should move system messages out of the message list', () => {
      const messages: LLMMessage[] = [
        { role: 'system', content: 'Rule one.' },
        { role: 'system', content: 'Rule two.' },
        { role: 'user', content: 'show disk usage' },
      ];

      expect(adapter.formatRequest(messages, { model: 'claude-3-5-sonnet-20241022' })).toEqual({
        model: 'claude-3-5-sonnet-20241022',
        system: 'Rule one.\n\nRule two.',
        messages: [{ role: 'user', content: 'show disk usage' }],
        max_tokens: 1024,
        temperature: 0.2,
      });
    });

    it('should omit system when there is none', () => {
      const result = adapter.formatRequest([{ role: 'user', content: 'hi' }], { model: 'm', maxTokens: 10 });

      expect(result.system).toBeUndefined();
      expect(result.max_tokens).toBe(10);
    });
  });

  describe('parseResponse', () => {
    it('should concatenate text blocks and sum usage', () => {
      const result = adapter.parseResponse(
        {
          status: 200,
          statusText: 'OK',
          data: {
            content: [
              { type: 'text', text: '{"command":' },
              { type: 'tool_use' },
              { type: 'text', text: '"df -h"}' },
            ],
            usage: { input_tokens: 30, output_tokens: 12 },
            stop_reason: 'end_turn',
          },
        },
        'claude-3-5-sonnet-20241022'
      );

      expect(result).toEqual({
        content: '{"command":"df -h"}',
        tokensUsed: 42,
        model: 'claude-3-5-sonnet-20241022',
        finishReason: 'stop',
      });
    });

    it('should return null content for an empty reply', () => {
      const result = adapter.parseResponse(
        { status: 200, statusText: 'OK', data: { content: [], stop_reason: 'max_tokens' } },
        'm'
      );

      expect(result.content).toBeNull();
      expect(result.finishReason).toBe('length');
    });
  });

  describe('buildHeaders', () => {
    it('should send the key and API version', () => {
      expect(adapter.buildHeaders({ apiKey: 'test-secret' })).toEqual({
        'Content-Type': 'application/json',
        'anthropic-version': '2023-06-01',
        'x-api-key': 'test-secret',
      });
    });
  });

  describe('buildUrl', () => {
    it('should append messages', () => {
      expect(adapter.buildUrl('https://api.anthropic.com/v1', 'any')).toBe('https://api.anthropic.com/v1/messages');
    });
  });

  it('should read the error message', () => {
    expect(
      adapter.extractErrorMessage({ type: 'error', error: { type: 'authentication_error', message: 'invalid x-api-key' } })
    ).toBe('invalid x-api-key');
  });

  it('should be returned by getProtocolAdapter', () => {
    expect(getProtocolAdapter('anthropic')).toBe(getAnthropicProtocol());
  });
});
