import { Command } from 'commander';
import chalk from 'chalk';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { getHistory } from '../provenance/index.js';
import { formatTimestamp, pluralize } from '../utils/time.js';
import { parseLimit } from './sessions.js';

async function runHistory(options: { limit: number }): Promise<void> {
  const history = await getHistory(getStore(), process.cwd(), options.limit, loadConfig());

  if (history.length === 0) {
    console.log(chalk.yellow('No prompt history for this repository.'));
    return;
  }

  for (const session of history) {
    console.log(
      chalk.bold(`Session ${session.id.slice(0, 8)}`) +
        chalk.gray(
          `  ${formatTimestamp(session.startedAt)}, ${pluralize(session.prompts.length, 'prompt')}, ${session.state}`,
        ),
    );
    for (const prompt of session.prompts) {
      const commit = prompt.commitHash
        ? chalk.green(prompt.commitHash.slice(0, 7))
        : chalk.yellow('pending');
      const [first, ...rest] = prompt.text.split('\n');
      console.log(`  ${chalk.gray(formatTimestamp(prompt.timestamp))} ${commit}  ${first}`);
      for (const line of rest) {
        console.log(`  ${' '.repeat(25)}${line}`);
      }
    }
    console.log('');
  }
}

export function createHistoryCommand(): Command {
  return new Command('history')
    .description('Show every recorded prompt for this repository, by session')
    .option('--limit <n>', 'Number of sessions to show', parseLimit, 10)
    .action(runHistory);
}
