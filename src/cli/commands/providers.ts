import { Command } from 'commander';
import chalk from 'chalk';
import {
  getAllEndpointConfigs,
  resolveCredentials,
  type EndpointConfig,
} from '../../infra/llm/endpoints/index.js';
import { loadCredentialsFile, loadSettings } from '../../infra/config/index.js';

export interface ProviderStatus {
  endpoint: EndpointConfig;
  configured: boolean;
  active: boolean;
}

export function getProviderStatuses(
  activeProvider: string,
  credentials: ReturnType<typeof loadCredentialsFile>,
  env: NodeJS.ProcessEnv = process.env
): ProviderStatus[] {
  return getAllEndpointConfigs().map((endpoint) => ({
    endpoint,
    configured: resolveCredentials(endpoint, credentials?.providers?.[endpoint.id], {}, env) !== null,
    active: endpoint.id === activeProvider,
  }));
}

function listProviders(): void {
  const settings = loadSettings();
  const statuses = getProviderStatuses(settings.provider, loadCredentialsFile());

  console.log(chalk.cyan('\nProviders:\n'));
  for (const { endpoint, configured, active } of statuses) {
    const marker = active ? chalk.green('●') : ' ';
    const state = configured ? chalk.green('configured') : chalk.dim(`set ${endpoint.apiKeyEnvVar}`);
    const model = endpoint.defaultModel || chalk.dim('(pass --model)');
    console.log(`  ${marker} ${chalk.bold(endpoint.id.padEnd(10))} ${endpoint.displayName.padEnd(22)} ${model}  ${state}`);
  }
  console.log();
}

export const providersCommand = new Command('providers')
  .description('List supported providers and which ones have credentials')
  .action(listProviders);
