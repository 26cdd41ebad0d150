import { Command } from 'commander';
import fs from 'node:fs/promises';
import chalk from 'chalk';
import { resolveRepoRoot } from '../repo/resolve.js';
import { installHooks } from '../git/hooks.js';
import { PROMPTRAIL_CONFIG_PATH, PROMPTRAIL_DIR } from '../utils/paths.js';
import { writeDefaultConfig } from '../config/config.js';
import { ResolutionError } from '../utils/errors.js';

async function runInit(options: { force?: boolean }): Promise<void> {
  let repoPath: string;
  try {
    repoPath = await resolveRepoRoot(process.cwd());
  } catch (err) {
    if (!(err instanceof ResolutionError)) throw err;
    console.error(
      chalk.red('Error: promptrail init must be run inside a git repository.'),
    );
    process.exitCode = 1;
    return;
  }

  await fs.mkdir(PROMPTRAIL_DIR, { recursive: true });
  console.log(chalk.green('✓') + ` Using ${PROMPTRAIL_DIR}`);

  if (writeDefaultConfig()) {
    console.log(chalk.green('✓') + ` Created ${PROMPTRAIL_CONFIG_PATH}`);
  }

  const results = await installHooks(repoPath, options.force);
  for (const [name, result] of Object.entries(results)) {
    if (result === 'installed') {
      console.log(chalk.green('✓') + ` Installed ${name} hook`);
    } else {
      console.log(
        chalk.yellow('⚠') +
          ` Existing ${name} hook found. Use --force to overwrite.`,
      );
    }
  }

  console.log(chalk.green(`\npromptrail initialized in ${repoPath}`));
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Install the promptrail git hooks in the current repository')
    .option('--force', 'Overwrite existing git hooks')
    .action(runInit);
}
