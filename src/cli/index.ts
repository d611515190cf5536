#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { EXIT_CODES } from '../domain/loop/types.js';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { configCommand } from './commands/config.js';
import { historyCommand } from './commands/history.js';
import { providersCommand } from './commands/providers.js';
import { reportFatalError } from './lib/errors.js';

const program = new Command();

program
  .name('cmdwise')
  .description('Turn a plain-language request into a shell command, check it and run it')
  .version('0.1.0')
  .argument('[request...]', 'What you want to do')
  .option('--max-retries <n>', 'Retries after a failed attempt (default 3)')
  .option('--provider <name>', 'Provider to use (see `cmdwise providers`)')
  .option('--model <id>', 'Model to use')
  .option('--base-url <url>', 'Override the provider base URL')
  .option('--timeout <ms>', 'Command timeout in milliseconds')
  .option('-y, --yes', 'Approve risky commands without asking')
  .option('--no-confirm', 'Same as --yes')
  .option('--decline', 'Decline risky commands without asking')
  .option('--dry-run', 'Propose and classify only, never execute')
  .option('--verbose', 'Print diagnostics to stderr')
  .option('--no-history', 'Do not record this request in history')
  .action(async (words: string[], options: RunCommandOptions) => {
    process.exitCode = await runCommand(words, options);
  });

program.addCommand(providersCommand);
program.addCommand(historyCommand);
program.addCommand(configCommand);

program.exitOverride((error: CommanderError) => {
  process.exit(error.exitCode === 0 ? 0 : EXIT_CODES.usage);
});

program.parseAsync().catch((error: unknown) => {
  process.exitCode = reportFatalError(error);
});
