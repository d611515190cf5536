import { ProviderError } from './llm-provider.js';
import { HttpLLMProvider } from './http-provider.js';
import {
  GENERIC_API_KEY_ENV_VAR,
  getAllEndpointConfigs,
  getEndpointConfig,
  isProviderId,
  resolveCredentials,
  type ProviderCredential,
} from './endpoints/index.js';
import type { Logger } from '../logging/logger.js';

export interface ProviderSelection {
  provider: string;
  /** Empty means the provider's default */
  model?: string;
  /** Empty means the credentials file or the provider's default */
  baseUrl?: string;
  timeoutMs?: number;
}

export interface ProviderFactoryOptions {
  credential?: ProviderCredential;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

/**
 * Build the provider for the configured name.
 * Unknown providers, missing keys and missing models are fatal ProviderErrors.
 */
export function createLLMProvider(selection: ProviderSelection, options: ProviderFactoryOptions = {}): HttpLLMProvider {
  const { provider } = selection;

  if (!isProviderId(provider)) {
    const known = getAllEndpointConfigs().map((endpoint) => endpoint.id).join(', ');
    throw new ProviderError(`Unknown provider "${provider}". Available: ${known}`, provider, false);
  }

  const endpoint = getEndpointConfig(provider);
  const env = options.env ?? process.env;
  const credentials = resolveCredentials(endpoint, options.credential, { baseUrl: selection.baseUrl || undefined }, env);

  if (!credentials) {
    const hasKey = Boolean(
      env[endpoint.apiKeyEnvVar]?.trim() || env[GENERIC_API_KEY_ENV_VAR]?.trim() || options.credential?.apiKey?.trim()
    );
    const missing = hasKey
      ? 'base URL (pass --base-url or set it in credentials.json)'
      : `API key (set ${endpoint.apiKeyEnvVar} or ${GENERIC_API_KEY_ENV_VAR}, or add it to credentials.json)`;
    throw new ProviderError(`No ${missing} configured for ${endpoint.displayName}`, provider, false);
  }

  const model = selection.model || endpoint.defaultModel;
  if (!model) {
    throw new ProviderError(`No model configured for ${endpoint.displayName}; pass --model`, provider, false);
  }

  return new HttpLLMProvider({
    endpoint,
    credentials,
    model,
    defaultTimeout: selection.timeoutMs,
    logger: options.logger,
    fetchImpl: options.fetchImpl,
  });
}
