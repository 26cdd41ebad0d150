import type BetterSqlite3 from 'better-sqlite3';
import { getPrompt, markCommitted } from '../store/prompts.js';
import { closeIfFullyCommitted } from '../store/sessions.js';
import { withStore } from '../store/index.js';

export interface CommitEvent {
  repoKey: string;
  commitHash: string;
  /** The ids captured when the trailer for this commit was rendered. */
  promptIds: string[];
  at?: Date;
}

export interface ReconcileResult {
  marked: number;
  closedSessions: string[];
}

/**
 * Mark exactly the rendered snapshot as covered by `commitHash`. Prompts
 * recorded after the snapshot stay uncommitted for the next commit. Owned
 * sessions left with nothing uncommitted are closed.
 */
export function reconcileCommit(
  db: BetterSqlite3.Database,
  event: CommitEvent,
): ReconcileResult {
  if (event.promptIds.length === 0) return { marked: 0, closedSessions: [] };
  const at = event.at ?? new Date();

  return withStore('reconcile commit', () => {
    const run = db.transaction((): ReconcileResult => {
      const marked = markCommitted(db, event.repoKey, event.promptIds, event.commitHash, at);

      const owned = new Set<string>();
      for (const id of event.promptIds) {
        const prompt = getPrompt(db, id);
        if (prompt && prompt.repoKey === event.repoKey) owned.add(prompt.sessionId);
      }

      const closedSessions = [...owned].filter((sessionId) =>
        closeIfFullyCommitted(db, sessionId, at),
      );
      return { marked, closedSessions };
    });
    return run.immediate();
  });
}
