import path from 'node:path';
import { gitAt } from './client.js';
import { describeError } from '../utils/errors.js';
import { debug } from '../utils/logger.js';

export interface WorkingTreeChanges {
  /** Paths with staged or unstaged changes against HEAD. */
  files: string[];
  /** `git diff --stat HEAD`, without the trailing newline. */
  stat: string;
}

export async function getHeadCommit(repoPath: string): Promise<string> {
  return (await gitAt(repoPath).revparse(['HEAD'])).trim();
}

/** The checked-out branch; undefined on a detached HEAD or outside git. */
export async function getBranchName(repoPath: string): Promise<string | undefined> {
  try {
    const result = await gitAt(repoPath).raw(['branch', '--show-current']);
    return result.trim() || undefined;
  } catch (err) {
    debug(`No branch for ${repoPath}: ${describeError(err)}`);
    return undefined;
  }
}

export async function getCurrentBranch(repoPath: string): Promise<string> {
  return (await getBranchName(repoPath)) ?? 'HEAD';
}

/** Tracked changes not yet committed. Fails before the first commit. */
export async function getWorkingTreeChanges(repoPath: string): Promise<WorkingTreeChanges> {
  const git = gitAt(repoPath);
  const names = await git.raw(['diff', '--name-only', 'HEAD']);
  const stat = await git.raw(['diff', '--stat', 'HEAD']);
  return {
    files: names
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean),
    stat: stat.trimEnd(),
  };
}

/**
 * Hashes of the commits on HEAD that are not on `baseBranch`, oldest first.
 */
export async function collectBranchCommits(
  repoPath: string,
  baseBranch: string,
): Promise<string[]> {
  const result = await gitAt(repoPath).raw([
    'rev-list',
    '--reverse',
    `${baseBranch}..HEAD`,
  ]);
  return result
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * The character git treats as a comment marker in commit messages.
 * `core.commentChar=auto` and unset both fall back to `#`.
 */
export async function getCommentChar(repoPath: string): Promise<string> {
  try {
    const value = (await gitAt(repoPath).raw(['config', '--get', 'core.commentChar'])).trim();
    if (!value || value === 'auto') return '#';
    return value;
  } catch {
    // `git config --get` exits 1 when the key is unset
    return '#';
  }
}

export async function getGitDir(repoPath: string): Promise<string> {
  const dir = (await gitAt(repoPath).revparse(['--absolute-git-dir'])).trim();
  return path.resolve(repoPath, dir);
}

/** Honors core.hooksPath. */
export async function getHooksDir(repoPath: string): Promise<string> {
  const dir = (await gitAt(repoPath).revparse(['--git-path', 'hooks'])).trim();
  return path.resolve(repoPath, dir);
}
