/**
 * Configuration module exports
 */
export { getConfigDir, getLogDir, getHistoryPath, getAttemptLogPath } from './config-paths.js';

export {
  type CredentialsFile,
  CredentialsValidationError,
  CREDENTIALS_SCHEMA,
  getCredentialsPath,
  loadCredentialsFile,
  validateCredentials,
  getProviderCredential,
} from './credentials-loader.js';

export {
  type CmdwiseSettings,
  type SettingsOverrides,
  ConfigValidationError,
  DEFAULT_SETTINGS,
  SETTINGS_SCHEMA,
  getSettingsPath,
  validateSettings,
  loadSettingsFile,
  resolveSettingsFromEnvironment,
  mergeSettings,
  loadSettings,
} from './runtime-config.js';

export {
  type OnboardingFile,
  type InitFileResult,
  type InitOptions,
  getOnboardingFiles,
  initConfigFile,
  initAllConfigFiles,
  isOnboardingNeeded,
} from './onboarding.js';
