import * as fs from 'fs';
import * as path from 'path';
import { getCredentialsPath } from './credentials-loader.js';
import { DEFAULT_SETTINGS, getSettingsPath } from './runtime-config.js';
import { getAllEndpointConfigs } from '../llm/endpoints/endpoint-config.js';

/**
 * Template for cmdwise.json
 */
export function getSettingsTemplate(): object {
  return { ...DEFAULT_SETTINGS };
}

/**
 * Template for credentials.json (no sensitive data)
 */
export function getCredentialsTemplate(): object {
  const providers: Record<string, { apiKey: string }> = {};
  for (const endpoint of getAllEndpointConfigs()) {
    providers[endpoint.id] = { apiKey: '' };
  }
  return { providers };
}

export interface OnboardingFile {
  name: string;
  path: string;
  template: object;
  mode: number;
  description: string;
}

export function getOnboardingFiles(): OnboardingFile[] {
  return [
    {
      name: 'cmdwise.json',
      path: getSettingsPath(),
      template: getSettingsTemplate(),
      mode: 0o644,
      description: 'Provider, model and loop settings',
    },
    {
      name: 'credentials.json',
      path: getCredentialsPath(),
      template: getCredentialsTemplate(),
      mode: 0o600,
      description: 'API keys per provider',
    },
  ];
}

export interface InitFileResult {
  file: string;
  status: 'created' | 'exists' | 'error';
  message: string;
}

export interface InitOptions {
  /** Overwrite existing files */
  force?: boolean;
  /** Only report what would be created */
  dryRun?: boolean;
}

/**
 * Initialize a single config file
 */
export function initConfigFile(file: OnboardingFile, options: InitOptions = {}): InitFileResult {
  const { force = false, dryRun = false } = options;

  try {
    if (fs.existsSync(file.path) && !force) {
      return { file: file.name, status: 'exists', message: `Already exists at ${file.path}` };
    }

    if (dryRun) {
      return { file: file.name, status: 'created', message: `Would create at ${file.path}` };
    }

    const dir = path.dirname(file.path);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(file.path, JSON.stringify(file.template, null, 2) + '\n', { mode: file.mode });
    return { file: file.name, status: 'created', message: `Created at ${file.path}` };
  } catch (error) {
    return {
      file: file.name,
      status: 'error',
      message: `Failed to create: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

export function initAllConfigFiles(options: InitOptions = {}): InitFileResult[] {
  return getOnboardingFiles().map((file) => initConfigFile(file, options));
}

export function isOnboardingNeeded(): boolean {
  return getOnboardingFiles().some((file) => !fs.existsSync(file.path));
}
