import type BetterSqlite3 from 'better-sqlite3';
import type { RepoLink } from '../provenance/types.js';
import { withStore } from './index.js';
import { requireSession } from './sessions.js';

interface RepoLinkRow {
  session_id: string;
  target_repo_key: string;
  created_at: string;
  branch: string | null;
}

function loadFiles(
  db: BetterSqlite3.Database,
  sessionId: string,
  targetRepoKey: string,
): string[] {
  return db
    .prepare<[string, string], { file_path: string }>(
      `SELECT file_path FROM repo_link_files
       WHERE session_id = ? AND target_repo_key = ?
       ORDER BY rowid`,
    )
    .all(sessionId, targetRepoKey)
    .map((r) => r.file_path);
}

function rowToLink(db: BetterSqlite3.Database, row: RepoLinkRow): RepoLink {
  return {
    sessionId: row.session_id,
    targetRepoKey: row.target_repo_key,
    files: loadFiles(db, row.session_id, row.target_repo_key),
    createdAt: new Date(row.created_at),
    branch: row.branch ?? undefined,
  };
}

export function isSessionLinked(
  db: BetterSqlite3.Database,
  sessionId: string,
  targetRepoKey: string,
): boolean {
  const row = db
    .prepare<[string, string], { found: number }>(
      `SELECT 1 as found FROM repo_links
       WHERE session_id = ? AND target_repo_key = ?`,
    )
    .get(sessionId, targetRepoKey);
  return row !== undefined;
}

export function getRepoLink(
  db: BetterSqlite3.Database,
  sessionId: string,
  targetRepoKey: string,
): RepoLink | null {
  return withStore('get repo link', () => {
    const row = db
      .prepare<[string, string], RepoLinkRow>(
        `SELECT * FROM repo_links WHERE session_id = ? AND target_repo_key = ?`,
      )
      .get(sessionId, targetRepoKey);
    return row ? rowToLink(db, row) : null;
  });
}

/**
 * Create the (session, target) reference on first sight and add `filePath`
 * to its file set. The reference keeps the branch it was first made on.
 * Returns null without writing when the target is the session's own
 * repository.
 */
export function upsertRepoLink(
  db: BetterSqlite3.Database,
  sessionId: string,
  targetRepoKey: string,
  filePath: string,
  at: Date = new Date(),
  branch?: string,
): RepoLink | null {
  return withStore('upsert repo link', () => {
    const upsert = db.transaction((): boolean => {
      const session = requireSession(db, sessionId);
      if (session.repoKey === targetRepoKey) return false;

      db.prepare(
        `INSERT OR IGNORE INTO repo_links (session_id, target_repo_key, created_at, branch)
         VALUES (?, ?, ?, ?)`,
      ).run(sessionId, targetRepoKey, at.toISOString(), branch ?? null);
      db.prepare(
        `INSERT OR IGNORE INTO repo_link_files (session_id, target_repo_key, file_path, added_at)
         VALUES (?, ?, ?, ?)`,
      ).run(sessionId, targetRepoKey, filePath, at.toISOString());
      return true;
    });

    if (!upsert.immediate()) return null;
    return getRepoLink(db, sessionId, targetRepoKey);
  });
}

/** References pointing into `targetRepoKey`, oldest first. */
export function getLinksForTarget(
  db: BetterSqlite3.Database,
  targetRepoKey: string,
): RepoLink[] {
  return withStore('get links for repository', () =>
    db
      .prepare<[string], RepoLinkRow>(
        `SELECT * FROM repo_links WHERE target_repo_key = ?
         ORDER BY created_at, rowid`,
      )
      .all(targetRepoKey)
      .map((row) => rowToLink(db, row)),
  );
}

export function getLinksForSession(
  db: BetterSqlite3.Database,
  sessionId: string,
): RepoLink[] {
  return withStore('get links for session', () =>
    db
      .prepare<[string], RepoLinkRow>(
        `SELECT * FROM repo_links WHERE session_id = ?
         ORDER BY created_at, rowid`,
      )
      .all(sessionId)
      .map((row) => rowToLink(db, row)),
  );
}
