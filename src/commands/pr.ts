import { Command } from 'commander';
import { spawnSync } from 'node:child_process';
import chalk from 'chalk';
import ora from 'ora';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { renderPrBody } from '../provenance/index.js';
import { resolveRepoRoot } from '../repo/resolve.js';
import { collectBranchCommits, getCurrentBranch } from '../git/log.js';
import { describeError } from '../utils/errors.js';
import { pluralize } from '../utils/time.js';

interface PrOptions {
  base: string;
  repo?: string;
  dryRun?: boolean;
}

async function runPr(ghArgs: string[], options: PrOptions): Promise<void> {
  const repoPath = await resolveRepoRoot(options.repo ?? process.cwd());
  const branch = await getCurrentBranch(repoPath);
  if (branch === options.base) {
    console.error(chalk.red(`Error: already on ${options.base}; check out a feature branch first.`));
    process.exitCode = 1;
    return;
  }

  const spinner = ora(`Collecting commits on ${branch} since ${options.base}...`).start();

  let body: string;
  let commitCount: number;
  try {
    const hashes = await collectBranchCommits(repoPath, options.base);
    commitCount = hashes.length;
    body = await renderPrBody(getStore(), repoPath, hashes, loadConfig());
    spinner.succeed(`Rendered provenance for ${pluralize(commitCount, 'commit')}`);
  } catch (err) {
    spinner.fail('Failed to render pull request body');
    console.error(chalk.red(describeError(err)));
    process.exitCode = 1;
    return;
  }

  if (options.dryRun) {
    console.log(body || chalk.yellow('No AI provenance on this branch.'));
    return;
  }

  const result = spawnSync(
    'gh',
    ['pr', 'create', '--base', options.base, '--body', body, ...ghArgs],
    { cwd: repoPath, stdio: 'inherit' },
  );
  if (result.error) {
    console.error(chalk.red(`Could not run gh: ${result.error.message}`));
    process.exitCode = 1;
    return;
  }
  process.exitCode = result.status ?? 1;
}

export function createPrCommand(): Command {
  return new Command('pr')
    .description('Open a pull request whose body carries the branch prompt history')
    .argument('[gh-args...]', 'Extra arguments for `gh pr create` (after --)')
    .option('--base <branch>', 'Base branch to compare against', 'main')
    .option('--repo <path>', 'Repository path (defaults to the current directory)')
    .option('--dry-run', 'Print the body instead of creating the pull request')
    .action(runPr);
}
