export {
  type ProviderId,
  type EndpointConfig,
  type ProviderCredential,
  type ResolvedEndpointCredentials,
  ENDPOINT_CONFIGS,
  GENERIC_API_KEY_ENV_VAR,
  isProviderId,
  getEndpointConfig,
  getAllEndpointConfigs,
  resolveCredentials,
} from './endpoint-config.js';
