import type { ILLMProvider, LLMMessage, LLMResponse, LLMRequestOptions } from './llm-provider.js';
import { ProviderError } from './llm-provider.js';
import type { IProtocolAdapter } from './protocols/index.js';
import { getProtocolAdapter } from './protocols/index.js';
import type { EndpointConfig, ResolvedEndpointCredentials } from './endpoints/index.js';
import { AbortError, describeAbortReason, linkAbortSignal, throwIfAborted } from '../../app/execution/abort-signals.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';

/**
 * Configuration for HttpLLMProvider
 */
export interface HttpProviderConfig {
  endpoint: EndpointConfig;
  credentials: ResolvedEndpointCredentials;
  model: string;
  /** Default timeout in ms */
  defaultTimeout?: number;
  defaultMaxTokens?: number;
  logger?: Logger;
  /** Injected for tests; defaults to global fetch */
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 60000;

/**
 * One configured endpoint reached over HTTPS through its protocol adapter.
 * Every failure surfaces as ProviderError, except user aborts which surface as AbortError.
 */
export class HttpLLMProvider implements ILLMProvider {
  private adapter: IProtocolAdapter;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(private config: HttpProviderConfig) {
    this.adapter = getProtocolAdapter(config.endpoint.protocol);
    this.logger = config.logger ?? silentLogger;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  getName(): string {
    return this.config.endpoint.id;
  }

  async complete(messages: LLMMessage[], options: LLMRequestOptions = {}): Promise<LLMResponse> {
    const { endpoint, credentials } = this.config;
    const model = options.model || this.config.model;
    if (!model) {
      throw new ProviderError(`No model configured for ${endpoint.displayName}`, endpoint.id, false);
    }

    const requestBody = this.adapter.formatRequest(messages, {
      model,
      maxTokens: options.maxTokens || this.config.defaultMaxTokens,
      temperature: options.temperature,
    });
    const url = this.adapter.buildUrl(credentials.baseUrl, model);
    const headers = this.adapter.buildHeaders({ apiKey: credentials.apiKey });
    const timeout = options.timeout || this.config.defaultTimeout || DEFAULT_TIMEOUT_MS;

    const linked = linkAbortSignal(options.signal, timeout);
    const startedAt = Date.now();
    this.logger.debug('[HttpProvider] Request', { provider: endpoint.id, model, url });

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'POST',
          headers,
          body: JSON.stringify(requestBody),
          signal: linked.signal,
        });
      } catch (error) {
        throw this.toTransportError(error, linked.timedOut(), timeout, options.signal);
      }

      const data: unknown = await response.json().catch(() => ({ error: { message: response.statusText } }));
      throwIfAborted(options.signal);

      this.logger.debug('[HttpProvider] Response', {
        provider: endpoint.id,
        status: response.status,
        durationMs: Date.now() - startedAt,
      });

      if (!response.ok) {
        const errorMessage = this.adapter.extractErrorMessage(data);
        const recoverable = this.adapter.isRecoverableError(response.status, data);
        throw new ProviderError(
          `${endpoint.displayName} API error (${response.status}): ${errorMessage}`,
          endpoint.id,
          recoverable,
          response.status
        );
      }

      return this.adapter.parseResponse(
        { status: response.status, statusText: response.statusText, data },
        model
      );
    } finally {
      linked.dispose();
    }
  }

  private toTransportError(
    error: unknown,
    timedOut: boolean,
    timeout: number,
    callerSignal: AbortSignal | undefined
  ): Error {
    const providerId = this.config.endpoint.id;

    if (callerSignal?.aborted) {
      return new AbortError(describeAbortReason(callerSignal));
    }
    if (timedOut) {
      return new ProviderError(`Request to ${this.config.endpoint.displayName} timed out after ${timeout}ms`, providerId, true);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`Network error contacting ${this.config.endpoint.displayName}: ${message}`, providerId, true);
  }
}
