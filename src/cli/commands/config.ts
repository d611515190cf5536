import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigDir,
  getCredentialsPath,
  getSettingsPath,
  initAllConfigFiles,
  loadCredentialsFile,
  loadSettings,
} from '../../infra/config/index.js';
import { maskSecret } from '../lib/render.js';

function showConfig(): void {
  const settings = loadSettings();
  const credentials = loadCredentialsFile();

  console.log(chalk.cyan('\nEffective settings:\n'));
  console.log(JSON.stringify(settings, null, 2));

  console.log(chalk.cyan('\nCredentials:\n'));
  const providers = Object.entries(credentials?.providers ?? {});
  if (providers.length === 0) {
    console.log(chalk.dim(`  none in ${getCredentialsPath()}`));
  }
  for (const [id, credential] of providers) {
    const baseUrl = credential.baseUrl ? chalk.dim(` (${credential.baseUrl})`) : '';
    console.log(`  ${chalk.white(id.padEnd(10))} ${maskSecret(credential.apiKey)}${baseUrl}`);
  }
  console.log();
}

function initConfig(options: { force?: boolean; dryRun?: boolean }): void {
  const results = initAllConfigFiles({ force: options.force, dryRun: options.dryRun });

  for (const result of results) {
    const icon =
      result.status === 'created' ? chalk.green('✓') : result.status === 'exists' ? chalk.dim('•') : chalk.red('✗');
    console.log(`${icon} ${result.file}: ${result.message}`);
  }

  if (results.some((result) => result.status === 'error')) {
    process.exitCode = 1;
  }
}

export const configCommand = new Command('config').description('Inspect and initialize configuration');

configCommand.command('show').description('Show effective settings (keys masked)').action(showConfig);

configCommand
  .command('path')
  .description('Print the configuration directory')
  .action(() => {
    console.log(getConfigDir());
    console.log(chalk.dim(`settings:    ${getSettingsPath()}`));
    console.log(chalk.dim(`credentials: ${getCredentialsPath()}`));
  });

configCommand
  .command('init')
  .description('Write template config files (existing files are kept)')
  .option('--force', 'Overwrite existing files')
  .option('--dry-run', 'Only show what would be written')
  .action(initConfig);
