export type { ILLMProvider, LLMMessage, LLMResponse, LLMRequestOptions } from './llm-provider.js';
export { ProviderError } from './llm-provider.js';

export type {
  ProtocolId,
  EndpointCredentials,
  ProtocolRequestConfig,
  RawApiResponse,
  IProtocolAdapter,
} from './protocols/index.js';
export {
  BaseProtocolAdapter,
  AnthropicProtocolAdapter,
  OpenAIProtocolAdapter,
  getProtocolAdapter,
  getAnthropicProtocol,
  getOpenAIProtocol,
} from './protocols/index.js';

export type {
  ProviderId,
  EndpointConfig,
  ProviderCredential,
  ResolvedEndpointCredentials,
} from './endpoints/index.js';
export {
  ENDPOINT_CONFIGS,
  GENERIC_API_KEY_ENV_VAR,
  isProviderId,
  getEndpointConfig,
  getAllEndpointConfigs,
  resolveCredentials,
} from './endpoints/index.js';

export type { HttpProviderConfig } from './http-provider.js';
export { HttpLLMProvider } from './http-provider.js';

export type { ProviderSelection, ProviderFactoryOptions } from './provider-factory.js';
export { createLLMProvider } from './provider-factory.js';
