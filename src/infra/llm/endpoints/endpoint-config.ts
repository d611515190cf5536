import type { ProtocolId } from '../protocols/index.js';

/**
 * Supported provider identifiers
 */
export type ProviderId =
  | 'openai'
  | 'anthropic'
  | 'gemini'
  | 'mistral'
  | 'groq'
  | 'deepseek'
  | 'qwen'
  | 'moonshot'
  | 'zhipu'
  | 'custom';

/**
 * Provider endpoint configuration
 */
export interface EndpointConfig {
  id: ProviderId;
  /** Protocol used by this endpoint */
  protocol: ProtocolId;
  /** Base URL for API requests, empty when the user must supply one */
  baseUrl: string;
  defaultModel: string;
  /** Environment variable holding the API key */
  apiKeyEnvVar: string;
  displayName: string;
  /** Where to create a key */
  keyUrl?: string;
}

/**
 * Generic key variable consulted after the provider-specific one
 */
export const GENERIC_API_KEY_ENV_VAR = 'CMDWISE_API_KEY';

export const ENDPOINT_CONFIGS: Record<ProviderId, EndpointConfig> = {
  openai: {
    id: 'openai',
    protocol: 'openai',
    baseUrl: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o',
    apiKeyEnvVar: 'OPENAI_API_KEY',
    displayName: 'OpenAI',
    keyUrl: 'https://platform.openai.com/api-keys',
  },
  anthropic: {
    id: 'anthropic',
    protocol: 'anthropic',
    baseUrl: 'https://api.anthropic.com/v1',
    defaultModel: 'claude-3-5-sonnet-20241022',
    apiKeyEnvVar: 'ANTHROPIC_API_KEY',
    displayName: 'Anthropic',
    keyUrl: 'https://console.anthropic.com/settings/keys',
  },
  gemini: {
    id: 'gemini',
    protocol: 'openai',
    baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai',
    defaultModel: 'gemini-2.0-flash',
    apiKeyEnvVar: 'GEMINI_API_KEY',
    displayName: 'Google Gemini',
    keyUrl: 'https://aistudio.google.com/apikey',
  },
  mistral: {
    id: 'mistral',
    protocol: 'openai',
    baseUrl: 'https://api.mistral.ai/v1',
    defaultModel: 'mistral-large-latest',
    apiKeyEnvVar: 'MISTRAL_API_KEY',
    displayName: 'Mistral AI',
    keyUrl: 'https://console.mistral.ai/api-keys',
  },
  groq: {
    id: 'groq',
    protocol: 'openai',
    baseUrl: 'https://api.groq.com/openai/v1',
    defaultModel: 'llama-3.3-70b-versatile',
    apiKeyEnvVar: 'GROQ_API_KEY',
    displayName: 'Groq',
    keyUrl: 'https://console.groq.com/keys',
  },
  deepseek: {
    id: 'deepseek',
    protocol: 'openai',
    baseUrl: 'https://api.deepseek.com',
    defaultModel: 'deepseek-chat',
    apiKeyEnvVar: 'DEEPSEEK_API_KEY',
    displayName: 'DeepSeek',
    keyUrl: 'https://platform.deepseek.com/api_keys',
  },
  qwen: {
    id: 'qwen',
    protocol: 'openai',
    baseUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
    defaultModel: 'qwen-plus',
    apiKeyEnvVar: 'DASHSCOPE_API_KEY',
    displayName: 'Qwen',
    keyUrl: 'https://dashscope.console.aliyun.com/apiKey',
  },
  moonshot: {
    id: 'moonshot',
    protocol: 'openai',
    baseUrl: 'https://api.moonshot.cn/v1',
    defaultModel: 'moonshot-v1-8k',
    apiKeyEnvVar: 'MOONSHOT_API_KEY',
    displayName: 'Moonshot (Kimi)',
    keyUrl: 'https://platform.moonshot.cn/console/api-keys',
  },
  zhipu: {
    id: 'zhipu',
    protocol: 'openai',
    baseUrl: 'https://open.bigmodel.cn/api/paas/v4',
    defaultModel: 'glm-4',
    apiKeyEnvVar: 'ZHIPUAI_API_KEY',
    displayName: 'Zhipu AI (GLM)',
    keyUrl: 'https://open.bigmodel.cn/usercenter/apikeys',
  },
  custom: {
    id: 'custom',
    protocol: 'openai',
    baseUrl: '',
    defaultModel: '',
    apiKeyEnvVar: GENERIC_API_KEY_ENV_VAR,
    displayName: 'Custom (OpenAI-compatible)',
  },
};

export function isProviderId(value: string): value is ProviderId {
  return Object.prototype.hasOwnProperty.call(ENDPOINT_CONFIGS, value);
}

export function getEndpointConfig(id: ProviderId): EndpointConfig {
  return ENDPOINT_CONFIGS[id];
}

export function getAllEndpointConfigs(): EndpointConfig[] {
  return Object.values(ENDPOINT_CONFIGS);
}

/**
 * Credential entry for one provider, as stored in credentials.json
 */
export interface ProviderCredential {
  apiKey?: string;
  baseUrl?: string;
}

/**
 * Runtime credentials resolved from environment and credentials file
 */
export interface ResolvedEndpointCredentials {
  providerId: ProviderId;
  apiKey: string;
  baseUrl: string;
}

/**
 * Resolve the key and base URL for a provider.
 * Priority: provider env var > generic env var > credentials file.
 * Returns null when no key is available or no base URL is known.
 */
export function resolveCredentials(
  endpoint: EndpointConfig,
  fileCredential: ProviderCredential | undefined,
  overrides: { baseUrl?: string } = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedEndpointCredentials | null {
  const apiKey =
    nonEmpty(env[endpoint.apiKeyEnvVar]) ??
    nonEmpty(env[GENERIC_API_KEY_ENV_VAR]) ??
    nonEmpty(fileCredential?.apiKey);

  const baseUrl =
    nonEmpty(overrides.baseUrl) ??
    nonEmpty(fileCredential?.baseUrl) ??
    nonEmpty(endpoint.baseUrl);

  if (!apiKey || !baseUrl) {
    return null;
  }

  return { providerId: endpoint.id, apiKey, baseUrl };
}

function nonEmpty(value: string | undefined): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}
