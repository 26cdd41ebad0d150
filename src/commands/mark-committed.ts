import { Command } from 'commander';
import chalk from 'chalk';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { markAllCommitted } from '../provenance/index.js';
import { pluralize } from '../utils/time.js';

async function runMarkCommitted(commit: string | undefined): Promise<void> {
  const result = await markAllCommitted(getStore(), process.cwd(), commit, loadConfig());

  if (result.marked === 0) {
    console.log(chalk.yellow('No uncommitted prompts.'));
    return;
  }
  console.log(
    chalk.green(`Marked ${pluralize(result.marked, 'prompt')} committed in ${result.commitHash.slice(0, 7)}.`),
  );
}

export function createMarkCommittedCommand(): Command {
  return new Command('mark-committed')
    .description('Attribute every uncommitted prompt to a commit (defaults to HEAD)')
    .argument('[commit]', 'Commit hash')
    .action(runMarkCommitted);
}
