import fs from 'node:fs/promises';
import type BetterSqlite3 from 'better-sqlite3';
import type { Config } from '../config/config.js';
import { renderCommitTrailer, reconcileCommit } from '../provenance/index.js';
import { clearSnapshot, readSnapshot, writeSnapshot } from '../provenance/snapshot.js';
import { getCommentChar, getGitDir, getHeadCommit } from './log.js';
import { debug } from '../utils/logger.js';

const TRAILER_MARKER = '── AI Provenance';

// Commit sources whose message git builds itself
const SKIPPED_SOURCES = new Set(['merge', 'squash']);

export type PrepareOutcome = 'appended' | 'empty' | 'skipped';

/**
 * prepare-commit-msg: append the uncommitted prompt history to the message
 * file and leave the rendered ids in the git dir for post-commit.
 */
export async function prepareCommitMessage(
  db: BetterSqlite3.Database,
  repoPath: string,
  messageFile: string,
  source: string | undefined,
  config: Config,
): Promise<PrepareOutcome> {
  const gitDir = await getGitDir(repoPath);

  // Every exit rewrites or clears the pending snapshot: one left by an
  // aborted commit belongs to no later commit.
  if (source && SKIPPED_SOURCES.has(source)) {
    await clearSnapshot(gitDir);
    return 'skipped';
  }

  const current = await fs.readFile(messageFile, 'utf-8');
  if (current.includes(TRAILER_MARKER)) {
    // Amend or reused message: the history is already there
    debug('Commit message already carries a provenance block');
    await clearSnapshot(gitDir);
    return 'skipped';
  }

  const commentChar = await getCommentChar(repoPath);
  const rendered = await renderCommitTrailer(db, repoPath, config, { commentChar });
  if (!rendered.text) {
    await clearSnapshot(gitDir);
    return 'empty';
  }

  const base = current === '' || current.endsWith('\n') ? current : `${current}\n`;
  await fs.writeFile(messageFile, `${base}\n${rendered.text}\n`, 'utf-8');
  await writeSnapshot(gitDir, {
    repoKey: rendered.repoKey,
    promptIds: rendered.promptIds,
    renderedAt: new Date().toISOString(),
  });
  debug(`Trailer for ${rendered.promptIds.length} prompt(s) in ${rendered.mode} mode`);
  return 'appended';
}

/**
 * post-commit: reconcile the snapshot prepare-commit-msg left against HEAD.
 * Returns the number of prompts marked; 0 when no snapshot was pending.
 */
export async function finishCommit(
  db: BetterSqlite3.Database,
  repoPath: string,
): Promise<number> {
  const gitDir = await getGitDir(repoPath);
  const snapshot = await readSnapshot(gitDir);
  if (!snapshot) return 0;

  const head = await getHeadCommit(repoPath);
  const marked = await reconcileCommit(db, repoPath, head, snapshot.promptIds);
  await clearSnapshot(gitDir);
  debug(`Marked ${marked} prompt(s) committed in ${head}`);
  return marked;
}
