import { randomUUID } from 'node:crypto';
import type BetterSqlite3 from 'better-sqlite3';
import type {
  Session,
  SessionListing,
  SessionState,
} from '../provenance/types.js';
import { NotFoundError } from '../utils/errors.js';
import { withStore } from './index.js';

interface SessionRow {
  id: string;
  repo_key: string;
  started_at: string;
  last_activity_at: string;
  state: SessionState;
  closed_at: string | null;
  branch: string | null;
}

interface SessionListingRow extends SessionRow {
  total_prompts: number;
  uncommitted_prompts: number;
}

export function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    repoKey: row.repo_key,
    startedAt: new Date(row.started_at),
    lastActivityAt: new Date(row.last_activity_at),
    state: row.state,
    closedAt: row.closed_at ? new Date(row.closed_at) : undefined,
    branch: row.branch ?? undefined,
  };
}

export function getSession(
  db: BetterSqlite3.Database,
  sessionId: string,
): Session | null {
  return withStore('get session', () => {
    const row = db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(sessionId);
    return row ? rowToSession(row) : null;
  });
}

export function requireSession(
  db: BetterSqlite3.Database,
  sessionId: string,
): Session {
  const session = getSession(db, sessionId);
  if (!session) {
    throw new NotFoundError(`Session not found: ${sessionId}`, 'session', sessionId);
  }
  return session;
}

export function getOpenSession(
  db: BetterSqlite3.Database,
  repoKey: string,
): Session | null {
  const row = db
    .prepare<[string], SessionRow>(
      `SELECT * FROM sessions WHERE repo_key = ? AND state = 'open'`,
    )
    .get(repoKey);
  return row ? rowToSession(row) : null;
}

function markClosed(
  db: BetterSqlite3.Database,
  sessionId: string,
  at: Date,
): boolean {
  const result = db
    .prepare(
      `UPDATE sessions SET state = 'closed', closed_at = ?
       WHERE id = ? AND state = 'open'`,
    )
    .run(at.toISOString(), sessionId);
  return result.changes > 0;
}

/**
 * Route a prompt at `timestamp` to the repository's open session, opening a
 * new one when there is none or when the open one has been idle longer than
 * `inactivityWindowMs`. A known `branch` replaces the one on record.
 *
 * Must run inside the caller's write transaction: the read of the open
 * session and the insert that may follow form one atomic step. The partial
 * unique index on open sessions turns a lost race into a constraint error
 * rather than a second open session.
 */
export function openOrAttachSession(
  db: BetterSqlite3.Database,
  repoKey: string,
  timestamp: Date,
  inactivityWindowMs: number,
  hint?: string,
  branch?: string,
): Session {
  let open = getOpenSession(db, repoKey);

  if (open && timestamp.getTime() - open.lastActivityAt.getTime() > inactivityWindowMs) {
    markClosed(db, open.id, open.lastActivityAt);
    open = null;
  }

  let session: Session;
  if (open) {
    const lastActivityAt =
      timestamp > open.lastActivityAt ? timestamp : open.lastActivityAt;
    db.prepare(
      'UPDATE sessions SET last_activity_at = ?, branch = COALESCE(?, branch) WHERE id = ?',
    ).run(lastActivityAt.toISOString(), branch ?? null, open.id);
    session = { ...open, lastActivityAt, branch: branch ?? open.branch };
  } else {
    session = {
      id: randomUUID(),
      repoKey,
      startedAt: timestamp,
      lastActivityAt: timestamp,
      state: 'open',
      branch,
    };
    db.prepare(
      `INSERT INTO sessions (id, repo_key, started_at, last_activity_at, state, branch)
       VALUES (?, ?, ?, ?, 'open', ?)`,
    ).run(
      session.id,
      repoKey,
      timestamp.toISOString(),
      timestamp.toISOString(),
      branch ?? null,
    );
  }

  if (hint) {
    db.prepare(
      `INSERT OR IGNORE INTO session_hints (session_id, hint, first_seen_at)
       VALUES (?, ?, ?)`,
    ).run(session.id, hint, timestamp.toISOString());
  }

  return session;
}

/**
 * Lazily close sessions idle for longer than the window as of `now`.
 * A closed session's close time is its last activity.
 */
export function expireSessions(
  db: BetterSqlite3.Database,
  now: Date,
  inactivityWindowMs: number,
  repoKey?: string,
): number {
  return withStore('expire sessions', () => {
    const cutoff = new Date(now.getTime() - inactivityWindowMs).toISOString();
    const conditions = [`state = 'open'`, 'last_activity_at < ?'];
    const params: unknown[] = [cutoff];
    if (repoKey) {
      conditions.push('repo_key = ?');
      params.push(repoKey);
    }

    const result = db
      .prepare(
        `UPDATE sessions SET state = 'closed', closed_at = last_activity_at
         WHERE ${conditions.join(' AND ')}`,
      )
      .run(...params);
    return result.changes;
  });
}

/** Idempotent. Returns whether this call changed the state. */
export function closeSession(
  db: BetterSqlite3.Database,
  sessionId: string,
  at: Date = new Date(),
): boolean {
  return withStore('close session', () => {
    requireSession(db, sessionId);
    return markClosed(db, sessionId, at);
  });
}

/**
 * Close the session once a commit has covered every prompt it owns.
 */
export function closeIfFullyCommitted(
  db: BetterSqlite3.Database,
  sessionId: string,
  at: Date = new Date(),
): boolean {
  return withStore('close committed session', () => {
    const row = db
      .prepare<[string], { cnt: number }>(
        'SELECT COUNT(*) as cnt FROM prompts WHERE session_id = ? AND committed = 0',
      )
      .get(sessionId);
    if ((row?.cnt ?? 0) > 0) return false;
    return markClosed(db, sessionId, at);
  });
}

export function getSessionHints(
  db: BetterSqlite3.Database,
  sessionId: string,
): string[] {
  return withStore('get session hints', () =>
    db
      .prepare<[string], { hint: string }>(
        'SELECT hint FROM session_hints WHERE session_id = ? ORDER BY first_seen_at, rowid',
      )
      .all(sessionId)
      .map((r) => r.hint),
  );
}

/** Most recently active session that received prompts under `hint`. */
export function findSessionByHint(
  db: BetterSqlite3.Database,
  hint: string,
): Session | null {
  return withStore('find session by hint', () => {
    const row = db
      .prepare<[string], SessionRow>(
        `SELECT s.* FROM sessions s
         JOIN session_hints h ON h.session_id = s.id
         WHERE h.hint = ?
         ORDER BY s.last_activity_at DESC, s.id DESC
         LIMIT 1`,
      )
      .get(hint);
    return row ? rowToSession(row) : null;
  });
}

/**
 * Exact id or unique prefix. Throws NotFoundError when nothing matches or
 * the prefix is ambiguous.
 */
export function findSessionByPrefix(
  db: BetterSqlite3.Database,
  prefix: string,
): Session {
  return withStore('find session', () => {
    const exact = getSession(db, prefix);
    if (exact) return exact;

    const rows = db
      .prepare<[number, string], SessionRow>(
        'SELECT * FROM sessions WHERE substr(id, 1, ?) = ? LIMIT 2',
      )
      .all(prefix.length, prefix);
    if (rows.length !== 1) {
      const reason = rows.length === 0 ? 'not found' : 'ambiguous';
      throw new NotFoundError(`Session ${reason}: ${prefix}`, 'session', prefix);
    }
    return rowToSession(rows[0]);
  });
}

export function getSessionsForRepo(
  db: BetterSqlite3.Database,
  repoKey: string,
  limit = 10,
): Session[] {
  return withStore('get sessions', () =>
    db
      .prepare<[string, number], SessionRow>(
        `SELECT * FROM sessions
         WHERE repo_key = ?
         ORDER BY started_at DESC, id DESC
         LIMIT ?`,
      )
      .all(repoKey, limit)
      .map(rowToSession),
  );
}

export function listSessions(
  db: BetterSqlite3.Database,
  repoKey: string,
  limit = 10,
): SessionListing[] {
  return withStore('list sessions', () => {
    const rows = db
      .prepare<[string, number], SessionListingRow>(
        `SELECT s.*,
                COUNT(p.id) AS total_prompts,
                COALESCE(SUM(CASE WHEN p.committed = 0 THEN 1 ELSE 0 END), 0) AS uncommitted_prompts
         FROM sessions s
         LEFT JOIN prompts p ON p.session_id = s.id
         WHERE s.repo_key = ?
         GROUP BY s.id
         ORDER BY s.started_at DESC, s.id DESC
         LIMIT ?`,
      )
      .all(repoKey, limit);

    return rows.map((row) => ({
      ...rowToSession(row),
      totalPrompts: row.total_prompts,
      uncommittedPrompts: row.uncommitted_prompts,
    }));
  });
}
