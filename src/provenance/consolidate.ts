import path from 'node:path';
import type BetterSqlite3 from 'better-sqlite3';
import type {
  ConsolidatedSession,
  ConsolidatedView,
  Prompt,
  RepoLink,
  Session,
} from './types.js';
import { requireSession } from '../store/sessions.js';
import { getLinksForTarget } from '../store/links.js';
import { relativeToRoot } from '../utils/paths.js';

/** Start time, then id, so identical snapshots render identically. */
export function compareSessions(a: Session, b: Session): number {
  const byStart = a.startedAt.getTime() - b.startedAt.getTime();
  if (byStart !== 0) return byStart;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

function toRepoRelative(repoKey: string, filePath: string): string | null {
  if (path.isAbsolute(filePath)) {
    return relativeToRoot(repoKey, filePath);
  }
  const normalized = path.normalize(filePath).split(path.sep).join('/');
  return normalized.startsWith('..') ? null : normalized;
}

export function dedupe(items: Iterable<string>): string[] {
  return [...new Set(items)];
}

/**
 * Files a session touched inside `repoKey`: tool-call targets in prompt
 * order, then the paths its cross-repository reference collected.
 */
export function collectFiles(
  repoKey: string,
  prompts: Prompt[],
  link?: RepoLink,
): string[] {
  const candidates: string[] = [];
  for (const prompt of prompts) {
    for (const call of prompt.toolCalls) {
      if (call.filePath) candidates.push(call.filePath);
    }
  }
  if (link) candidates.push(...link.files);

  const files: string[] = [];
  for (const candidate of candidates) {
    const rel = toRepoRelative(repoKey, candidate);
    if (rel) files.push(rel);
  }
  return dedupe(files);
}

/**
 * Group an ordered prompt list into sessions. Prompts keep the order they
 * arrive in; sessions are ordered by `compareSessions`. A session appears
 * only when at least one of its prompts is in `prompts`.
 */
export function buildView(
  repoKey: string,
  prompts: Prompt[],
  sessions: ReadonlyMap<string, Session>,
  links: ReadonlyMap<string, RepoLink>,
): ConsolidatedView {
  const grouped = new Map<string, Prompt[]>();
  for (const prompt of prompts) {
    const list = grouped.get(prompt.sessionId) ?? [];
    list.push(prompt);
    grouped.set(prompt.sessionId, list);
  }

  const consolidated: ConsolidatedSession[] = [];
  for (const [sessionId, sessionPrompts] of grouped) {
    const session = sessions.get(sessionId);
    if (!session) continue;
    const linked = session.repoKey !== repoKey;
    consolidated.push({
      session,
      prompts: sessionPrompts,
      files: collectFiles(repoKey, sessionPrompts, linked ? links.get(sessionId) : undefined),
      linked,
    });
  }
  consolidated.sort((a, b) => compareSessions(a.session, b.session));

  return {
    repoKey,
    sessions: consolidated,
    promptCount: consolidated.reduce((n, s) => n + s.prompts.length, 0),
    files: dedupe(consolidated.flatMap((s) => s.files)),
  };
}

/** Load the sessions and references `prompts` need and build the view. */
export function consolidate(
  db: BetterSqlite3.Database,
  repoKey: string,
  prompts: Prompt[],
): ConsolidatedView {
  const sessions = new Map<string, Session>();
  for (const prompt of prompts) {
    if (!sessions.has(prompt.sessionId)) {
      sessions.set(prompt.sessionId, requireSession(db, prompt.sessionId));
    }
  }

  const links = new Map<string, RepoLink>();
  for (const link of getLinksForTarget(db, repoKey)) {
    links.set(link.sessionId, link);
  }

  return buildView(repoKey, prompts, sessions, links);
}
