import { randomUUID } from 'node:crypto';
import type BetterSqlite3 from 'better-sqlite3';
import type {
  Prompt,
  SessionWithPrompts,
  ToolCall,
  ToolCallInput,
} from '../provenance/types.js';
import { NotFoundError } from '../utils/errors.js';
import { withStore } from './index.js';
import { getSessionsForRepo, openOrAttachSession } from './sessions.js';
import { isSessionLinked } from './links.js';

interface PromptRow {
  seq: number;
  id: string;
  session_id: string;
  repo_key: string;
  text: string;
  timestamp: string;
  committed: number;
  commit_hash: string | null;
}

interface ToolCallRow {
  prompt_id: string;
  tool_name: string;
  file_path: string | null;
  called_at: string;
}

export interface RecordPromptInput {
  repoKey: string;
  text: string;
  timestamp: Date;
  /** The assistant's own conversation id, kept for later tool-use lookups. */
  sessionHint?: string;
  /** Branch checked out in the repository, when it has one. */
  branch?: string;
  toolCalls?: ToolCallInput[];
}

export interface RecordOptions {
  inactivityWindowMs: number;
}

function rowToPrompt(row: PromptRow, toolCalls: ToolCall[]): Prompt {
  return {
    id: row.id,
    seq: row.seq,
    sessionId: row.session_id,
    repoKey: row.repo_key,
    text: row.text,
    timestamp: new Date(row.timestamp),
    toolCalls,
    committed: row.committed === 1,
    commitHash: row.commit_hash ?? undefined,
  };
}

// Tool calls for a batch of prompts in one query; ids travel as a JSON array
// so the statement never hits SQLite's bound-parameter limit.
function hydrate(db: BetterSqlite3.Database, rows: PromptRow[]): Prompt[] {
  if (rows.length === 0) return [];

  const callRows = db
    .prepare<[string], ToolCallRow>(
      `SELECT prompt_id, tool_name, file_path, called_at
       FROM tool_calls
       WHERE prompt_id IN (SELECT value FROM json_each(?))
       ORDER BY id`,
    )
    .all(JSON.stringify(rows.map((r) => r.id)));

  const byPrompt = new Map<string, ToolCall[]>();
  for (const call of callRows) {
    const list = byPrompt.get(call.prompt_id) ?? [];
    list.push({
      toolName: call.tool_name,
      filePath: call.file_path ?? undefined,
      calledAt: new Date(call.called_at),
    });
    byPrompt.set(call.prompt_id, list);
  }

  return rows.map((row) => rowToPrompt(row, byPrompt.get(row.id) ?? []));
}

function insertToolCalls(
  db: BetterSqlite3.Database,
  promptId: string,
  calls: ToolCallInput[],
  fallbackTime: Date,
): ToolCall[] {
  const stmt = db.prepare(
    `INSERT INTO tool_calls (prompt_id, tool_name, file_path, called_at)
     VALUES (?, ?, ?, ?)`,
  );
  return calls.map((call) => {
    const calledAt = call.calledAt ?? fallbackTime;
    stmt.run(promptId, call.toolName, call.filePath ?? null, calledAt.toISOString());
    return { toolName: call.toolName, filePath: call.filePath, calledAt };
  });
}

/**
 * Append a prompt to the store. Opening or attaching its session and the
 * insert itself happen in one IMMEDIATE transaction, so concurrent capture
 * processes never race each other into two open sessions.
 */
export function recordPrompt(
  db: BetterSqlite3.Database,
  input: RecordPromptInput,
  opts: RecordOptions,
): Prompt {
  return withStore('record prompt', () => {
    const record = db.transaction((): Prompt => {
      const session = openOrAttachSession(
        db,
        input.repoKey,
        input.timestamp,
        opts.inactivityWindowMs,
        input.sessionHint,
        input.branch,
      );

      const id = randomUUID();
      const result = db
        .prepare(
          `INSERT INTO prompts (id, session_id, repo_key, text, timestamp)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(id, session.id, input.repoKey, input.text, input.timestamp.toISOString());

      const toolCalls = insertToolCalls(db, id, input.toolCalls ?? [], input.timestamp);

      return {
        id,
        seq: Number(result.lastInsertRowid),
        sessionId: session.id,
        repoKey: input.repoKey,
        text: input.text,
        timestamp: input.timestamp,
        toolCalls,
        committed: false,
      };
    });

    return record.immediate();
  });
}

export function getPrompt(
  db: BetterSqlite3.Database,
  promptId: string,
): Prompt | null {
  return withStore('get prompt', () => {
    const row = db
      .prepare<[string], PromptRow>('SELECT * FROM prompts WHERE id = ?')
      .get(promptId);
    return row ? hydrate(db, [row])[0] : null;
  });
}

/**
 * Tool invocations arrive after their prompt was recorded. They form an
 * append-only child list; the prompt row itself is never rewritten.
 */
export function appendToolCalls(
  db: BetterSqlite3.Database,
  promptId: string,
  calls: ToolCallInput[],
): ToolCall[] {
  return withStore('append tool calls', () => {
    const exists = db
      .prepare<[string], { id: string }>('SELECT id FROM prompts WHERE id = ?')
      .get(promptId);
    if (!exists) {
      throw new NotFoundError(`Prompt not found: ${promptId}`, 'prompt', promptId);
    }
    const append = db.transaction(() =>
      insertToolCalls(db, promptId, calls, new Date()),
    );
    return append.immediate();
  });
}

/**
 * Mark prompts as covered by `commitHash` in `repoKey`.
 *
 * Prompts owned by the repository get their committed flag set; prompts that
 * reach it through a cross-repository link get a linked commit mark instead,
 * leaving the origin repository's view untouched. Already-covered prompts are
 * skipped, so retried hooks are harmless. Any unknown id aborts the whole
 * call with NotFoundError. Returns the number of prompts newly marked.
 */
export function markCommitted(
  db: BetterSqlite3.Database,
  repoKey: string,
  promptIds: string[],
  commitHash: string,
  at: Date = new Date(),
): number {
  return withStore('mark committed', () => {
    const lookup = db.prepare<[string], { session_id: string; repo_key: string }>(
      'SELECT session_id, repo_key FROM prompts WHERE id = ?',
    );
    const markOwned = db.prepare(
      `UPDATE prompts SET committed = 1, commit_hash = ?
       WHERE id = ? AND committed = 0`,
    );
    const markLinked = db.prepare(
      `INSERT OR IGNORE INTO linked_commits (prompt_id, target_repo_key, commit_hash, committed_at)
       VALUES (?, ?, ?, ?)`,
    );

    const markAll = db.transaction((): number => {
      let changed = 0;
      for (const id of new Set(promptIds)) {
        const row = lookup.get(id);
        if (!row) {
          throw new NotFoundError(`Prompt not found: ${id}`, 'prompt', id);
        }

        if (row.repo_key === repoKey) {
          changed += markOwned.run(commitHash, id).changes;
        } else if (isSessionLinked(db, row.session_id, repoKey)) {
          changed += markLinked.run(id, repoKey, commitHash, at.toISOString()).changes;
        } else {
          throw new NotFoundError(
            `Prompt ${id} is not attributed to repository ${repoKey}`,
            'prompt',
            id,
          );
        }
      }
      return changed;
    });

    return markAll.immediate();
  });
}

/**
 * Uncommitted prompts for a repository, oldest first: its own, plus prompts
 * of sessions linked into it that no commit here has covered yet.
 */
export function getUncommitted(
  db: BetterSqlite3.Database,
  repoKey: string,
): Prompt[] {
  return withStore('get uncommitted prompts', () => {
    const rows = db
      .prepare<[string, string, string, string], PromptRow>(
        `SELECT p.* FROM prompts p
         WHERE p.repo_key = ? AND p.committed = 0
         UNION ALL
         SELECT p.* FROM prompts p
         JOIN repo_links l ON l.session_id = p.session_id AND l.target_repo_key = ?
         WHERE p.repo_key != ?
           AND NOT EXISTS (
             SELECT 1 FROM linked_commits lc
             WHERE lc.prompt_id = p.id AND lc.target_repo_key = ?
           )
         ORDER BY timestamp ASC, seq ASC`,
      )
      .all(repoKey, repoKey, repoKey, repoKey);
    return hydrate(db, rows);
  });
}

/**
 * Prompts covered by any of `commitHashes` in this repository, oldest first.
 */
export function getByCommitRange(
  db: BetterSqlite3.Database,
  repoKey: string,
  commitHashes: string[],
): Prompt[] {
  if (commitHashes.length === 0) return [];

  return withStore('get prompts by commit range', () => {
    const hashes = JSON.stringify(commitHashes);
    const rows = db
      .prepare<[string, string, string, string], PromptRow>(
        `SELECT p.* FROM prompts p
         WHERE p.repo_key = ?
           AND p.commit_hash IN (SELECT value FROM json_each(?))
         UNION ALL
         SELECT p.* FROM prompts p
         JOIN linked_commits lc ON lc.prompt_id = p.id
         WHERE lc.target_repo_key = ?
           AND lc.commit_hash IN (SELECT value FROM json_each(?))
         ORDER BY timestamp ASC, seq ASC`,
      )
      .all(repoKey, hashes, repoKey, hashes);
    return hydrate(db, rows);
  });
}

export function getSessionPrompts(
  db: BetterSqlite3.Database,
  sessionId: string,
): Prompt[] {
  return withStore('get session prompts', () => {
    const rows = db
      .prepare<[string], PromptRow>(
        'SELECT * FROM prompts WHERE session_id = ? ORDER BY timestamp ASC, seq ASC',
      )
      .all(sessionId);
    return hydrate(db, rows);
  });
}

export function getLatestPromptForSession(
  db: BetterSqlite3.Database,
  sessionId: string,
): Prompt | null {
  return withStore('get latest prompt', () => {
    const row = db
      .prepare<[string], PromptRow>(
        `SELECT * FROM prompts WHERE session_id = ?
         ORDER BY timestamp DESC, seq DESC
         LIMIT 1`,
      )
      .get(sessionId);
    return row ? hydrate(db, [row])[0] : null;
  });
}

/**
 * The repository's own sessions, most recent first, each with every prompt
 * it holds. Together they partition the prompts recorded for the repository.
 */
export function getHistory(
  db: BetterSqlite3.Database,
  repoKey: string,
  limit = 10,
): SessionWithPrompts[] {
  return getSessionsForRepo(db, repoKey, limit).map((session) => ({
    ...session,
    prompts: getSessionPrompts(db, session.id),
  }));
}
