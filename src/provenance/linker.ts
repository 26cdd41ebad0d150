import type BetterSqlite3 from 'better-sqlite3';
import type { RepoLink } from './types.js';
import { canonicalPath, resolveRepoRoot } from '../repo/resolve.js';
import { upsertRepoLink } from '../store/links.js';
import { getBranchName } from '../git/log.js';
import { ResolutionError } from '../utils/errors.js';
import { debug } from '../utils/logger.js';

export interface FileEditEvent {
  sessionId: string;
  originRepoKey: string;
  /** Absolute path of the file the assistant wrote. */
  filePath: string;
}

export type RootResolver = (p: string) => Promise<string>;

/**
 * Attribute `sessionId` to the repository that actually contains the edited
 * file when it is not the session's own. Attribution only flows from the
 * origin session into the target repository.
 *
 * A file outside any repository is not an error: it is logged and the call
 * returns null. Store failures propagate.
 */
export async function noteFileEdit(
  db: BetterSqlite3.Database,
  event: FileEditEvent,
  resolve: RootResolver = resolveRepoRoot,
): Promise<RepoLink | null> {
  const filePath = canonicalPath(event.filePath);
  let targetRepoKey: string;
  try {
    targetRepoKey = await resolve(filePath);
  } catch (err) {
    if (err instanceof ResolutionError) {
      debug(`Edit outside any repository ignored: ${filePath}`);
      return null;
    }
    throw err;
  }

  if (targetRepoKey === event.originRepoKey) return null;

  const branch = await getBranchName(targetRepoKey);
  const link = upsertRepoLink(db, event.sessionId, targetRepoKey, filePath, new Date(), branch);
  if (link) {
    debug(`Session ${event.sessionId} linked into ${targetRepoKey}`);
  }
  return link;
}
