import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { getUncommitted, getWorkingTree } from '../provenance/index.js';
import { formatTimestamp, pluralize, truncate } from '../utils/time.js';

async function runUncommitted(options: { json?: boolean }): Promise<void> {
  const repoPath = process.cwd();
  const sessions = await getUncommitted(getStore(), repoPath, loadConfig());
  const tree = await getWorkingTree(repoPath);

  if (options.json) {
    console.log(JSON.stringify({ workingTree: tree, sessions }, null, 2));
    return;
  }

  if (tree) {
    console.log(chalk.bold('Branch: ') + (tree.branch ?? chalk.gray('(detached)')));
    if (tree.diffStat) {
      console.log(chalk.gray(tree.diffStat));
    }
    console.log();
  }

  if (sessions.length === 0) {
    console.log(chalk.yellow('No uncommitted prompts.'));
    return;
  }

  for (const entry of sessions) {
    const origin = entry.linked
      ? chalk.magenta(` linked from ${path.basename(entry.session.repoKey)}`)
      : '';
    console.log(
      chalk.bold(`Session ${entry.session.id.slice(0, 8)}`) +
        chalk.gray(` ${formatTimestamp(entry.session.startedAt)}`) +
        origin,
    );
    for (const prompt of entry.prompts) {
      const firstLine = prompt.text.split('\n')[0];
      console.log(
        '  ' + chalk.gray(formatTimestamp(prompt.timestamp)) + ' ' + truncate(firstLine, 90),
      );
    }
    if (entry.files.length > 0) {
      console.log('  ' + chalk.cyan(entry.files.join(', ')));
    }
  }

  const total = sessions.reduce((n, s) => n + s.prompts.length, 0);
  console.log(
    `\n${pluralize(total, 'uncommitted prompt')} in ${pluralize(sessions.length, 'session')}.`,
  );
}

export function createUncommittedCommand(): Command {
  return new Command('uncommitted')
    .description('Show prompts not yet covered by a commit')
    .option('--json', 'Print as JSON')
    .action(runUncommitted);
}
