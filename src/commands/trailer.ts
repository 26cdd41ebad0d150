import { Command } from 'commander';
import chalk from 'chalk';
import { getStore } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { renderCommitTrailer } from '../provenance/index.js';
import { getCommentChar } from '../git/log.js';

async function runTrailer(options: { commentChar?: string }): Promise<void> {
  const repoPath = process.cwd();
  const commentChar = options.commentChar ?? (await getCommentChar(repoPath));
  const rendered = await renderCommitTrailer(getStore(), repoPath, loadConfig(), {
    commentChar,
  });

  if (!rendered.text) {
    console.error(chalk.yellow('No uncommitted prompts.'));
    return;
  }
  console.log(rendered.text);
}

export function createTrailerCommand(): Command {
  return new Command('trailer')
    .description('Print the trailer the next commit would receive')
    .option('--comment-char <char>', 'Line prefix (defaults to core.commentChar)')
    .action(runTrailer);
}
