import type { LLMMessage, LLMResponse } from '../llm-provider.js';

/**
 * Supported protocol identifiers
 */
export type ProtocolId = 'anthropic' | 'openai';

/**
 * Credentials for endpoint authentication
 */
export interface EndpointCredentials {
  apiKey?: string;
}

/**
 * Request configuration for protocol adapters
 */
export interface ProtocolRequestConfig {
  model: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Raw response from API before parsing
 */
export interface RawApiResponse {
  status: number;
  statusText: string;
  data: unknown;
}

/**
 * Protocol adapter interface
 * Handles API format conversion between internal types and provider-specific formats
 */
export interface IProtocolAdapter {
  readonly protocolId: ProtocolId;

  /**
   * Format messages and config into provider-specific request body
   */
  formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): unknown;

  /**
   * Parse provider-specific response into standard LLMResponse
   */
  parseResponse(response: RawApiResponse, model: string): LLMResponse;

  buildHeaders(credentials: EndpointCredentials): Record<string, string>;

  buildUrl(baseUrl: string, model: string): string;

  /**
   * Whether a failed status is worth another attempt.
   * Credential, request and model errors are not.
   */
  isRecoverableError(status: number, response?: unknown): boolean;

  extractErrorMessage(response: unknown): string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Base class for protocol adapters with common functionality
 */
export abstract class BaseProtocolAdapter implements IProtocolAdapter {
  abstract readonly protocolId: ProtocolId;

  abstract formatRequest(messages: LLMMessage[], config: ProtocolRequestConfig): unknown;
  abstract parseResponse(response: RawApiResponse, model: string): LLMResponse;
  abstract buildHeaders(credentials: EndpointCredentials): Record<string, string>;
  abstract buildUrl(baseUrl: string, model: string): string;

  isRecoverableError(status: number, _response?: unknown): boolean {
    // Timeouts, conflicts, rate limits and server errors may clear up on the next attempt
    return status === 408 || status === 409 || status === 429 || status >= 500;
  }

  extractErrorMessage(response: unknown): string {
    if (isRecord(response)) {
      if (isRecord(response.error) && typeof response.error.message === 'string') {
        return response.error.message;
      }
      if (typeof response.message === 'string') {
        return response.message;
      }
    }
    return 'Unknown error';
  }

  /**
   * Map finish reason to standard format
   */
  protected mapFinishReason(reason: string | undefined | null): LLMResponse['finishReason'] {
    if (!reason) return 'stop';
    const normalized = reason.toLowerCase();
    if (normalized === 'stop' || normalized === 'end_turn' || normalized === 'stop_sequence') return 'stop';
    if (normalized === 'length' || normalized === 'max_tokens') return 'length';
    return 'error';
  }
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
