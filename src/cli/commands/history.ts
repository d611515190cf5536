import { Command } from 'commander';
import chalk from 'chalk';
import { getHistoryPath } from '../../infra/config/index.js';
import { HistoryStore } from '../../infra/persistence/history-store.js';
import { parsePositiveInt } from '../lib/usage-error.js';

export const historyCommand = new Command('history')
  .description('Show recent requests')
  .option('-n, --limit <n>', 'Number of entries', '20')
  .action((options: { limit: string }) => {
    const limit = parsePositiveInt(options.limit, '--limit');
    const entries = new HistoryStore(getHistoryPath()).read(limit);

    if (entries.length === 0) {
      console.log(chalk.dim('No history yet.'));
      return;
    }

    entries.forEach((entry, index) => {
      console.log(`${chalk.dim(String(index + 1).padStart(3))}  ${entry}`);
    });
  });
