import path from 'node:path';
import type BetterSqlite3 from 'better-sqlite3';
import type {
  ConsolidatedSession,
  Prompt,
  RepoLink,
  SessionListing,
  SessionSummary,
  SessionWithPrompts,
  ToolCallInput,
} from './types.js';
import type { Config } from '../config/config.js';
import { DEFAULT_CONFIG } from '../config/config.js';
import * as prompts from '../store/prompts.js';
import * as sessions from '../store/sessions.js';
import { getLinksForSession } from '../store/links.js';
import { canonicalPath, resolveRepoKey, resolveRepoRoot } from '../repo/resolve.js';
import { getBranchName, getHeadCommit, getWorkingTreeChanges } from '../git/log.js';
import { renderCommitTrailer as formatTrailer } from '../git/trailers.js';
import { renderPrBody as formatPrBody } from '../generators/pr-body.js';
import { consolidate, dedupe } from './consolidate.js';
import { noteFileEdit as linkFileEdit } from './linker.js';
import { reconcileCommit as reconcile } from './reconcile.js';
import { selectMode, type RenderMode, type RenderOptions } from './render.js';
import { relativeToRoot } from '../utils/paths.js';
import { PromptrailError, ResolutionError, describeError } from '../utils/errors.js';
import { debug, warn } from '../utils/logger.js';

export type { ConsolidatedView, Prompt, Session, SessionSummary } from './types.js';

/** Tools whose `file_path` is a file the assistant wrote. */
export const FILE_WRITE_TOOLS: ReadonlySet<string> = new Set([
  'Write',
  'Edit',
  'MultiEdit',
  'NotebookEdit',
]);

function windowMs(config: Config): number {
  return config.inactivityWindowMinutes * 60 * 1000;
}

function renderOptions(config: Config): RenderOptions {
  return {
    verboseThreshold: config.verboseThreshold,
    fileDisplayLimit: config.fileDisplayLimit,
  };
}

function expire(db: BetterSqlite3.Database, repoKey: string, config: Config): void {
  const closed = sessions.expireSessions(db, new Date(), windowMs(config), repoKey);
  if (closed > 0) debug(`Closed ${closed} idle session(s) in ${repoKey}`);
}

export interface RecordPromptRequest {
  /** The assistant's own conversation id. */
  sessionHint?: string;
  repoPath: string;
  text: string;
  timestamp?: Date;
  toolCalls?: ToolCallInput[];
}

/**
 * Capture one prompt. A path outside any git repository is keyed by its own
 * canonical directory. Store failures surface as StorageError so the caller
 * can drop the event.
 */
export async function recordPrompt(
  db: BetterSqlite3.Database,
  req: RecordPromptRequest,
  config: Config = DEFAULT_CONFIG,
): Promise<Prompt> {
  const repoKey = await resolveRepoKey(req.repoPath);
  const branch = await getBranchName(repoKey);
  return prompts.recordPrompt(
    db,
    {
      repoKey,
      text: req.text,
      timestamp: req.timestamp ?? new Date(),
      sessionHint: req.sessionHint,
      branch,
      toolCalls: req.toolCalls,
    },
    { inactivityWindowMs: windowMs(config) },
  );
}

export interface FileEditRequest {
  sessionId: string;
  originRepoPath: string;
  filePath: string;
}

/** Fire-and-forget: every failure is logged and swallowed. */
export async function noteFileEdit(
  db: BetterSqlite3.Database,
  req: FileEditRequest,
): Promise<RepoLink | null> {
  try {
    const originRepoKey = await resolveRepoKey(req.originRepoPath);
    return await linkFileEdit(db, {
      sessionId: req.sessionId,
      originRepoKey,
      filePath: canonicalPath(path.resolve(req.originRepoPath, req.filePath)),
    });
  } catch (err) {
    warn(`Could not record edit of ${req.filePath}: ${describeError(err)}`);
    return null;
  }
}

export interface ToolUseRequest {
  sessionHint: string;
  cwd: string;
  toolName: string;
  filePath?: string;
}

export interface ToolUseResult {
  promptId: string;
  link: RepoLink | null;
}

/**
 * Attach a tool invocation to the latest prompt of the session that received
 * `sessionHint`. Writes to a file in another repository also link the session
 * there. Returns null when no prompt has been captured for the hint yet.
 */
export async function recordToolUse(
  db: BetterSqlite3.Database,
  req: ToolUseRequest,
): Promise<ToolUseResult | null> {
  const session = sessions.findSessionByHint(db, req.sessionHint);
  if (!session) {
    debug(`No session for hint ${req.sessionHint}; tool use ignored`);
    return null;
  }
  const latest = prompts.getLatestPromptForSession(db, session.id);
  if (!latest) return null;

  // Stored in the same canonical form as repository keys, so a checkout
  // reached through a symlink still yields repository-relative paths
  const filePath = req.filePath ? canonicalPath(path.resolve(req.cwd, req.filePath)) : undefined;
  prompts.appendToolCalls(db, latest.id, [{ toolName: req.toolName, filePath }]);

  let link: RepoLink | null = null;
  if (filePath && FILE_WRITE_TOOLS.has(req.toolName)) {
    link = await noteFileEdit(db, {
      sessionId: session.id,
      originRepoPath: session.repoKey,
      filePath,
    });
  }
  return { promptId: latest.id, link };
}

export async function getUncommitted(
  db: BetterSqlite3.Database,
  repoPath: string,
  config: Config = DEFAULT_CONFIG,
): Promise<ConsolidatedSession[]> {
  const repoKey = await resolveRepoKey(repoPath);
  expire(db, repoKey, config);
  return consolidate(db, repoKey, prompts.getUncommitted(db, repoKey)).sessions;
}

export interface TrailerRequestOptions {
  commentChar?: string;
}

export interface RenderedTrailer {
  repoKey: string;
  /** Empty when there is nothing to attribute. */
  text: string;
  /** The snapshot to reconcile once the commit exists. */
  promptIds: string[];
  mode: RenderMode | null;
}

export async function renderCommitTrailer(
  db: BetterSqlite3.Database,
  repoPath: string,
  config: Config = DEFAULT_CONFIG,
  opts: TrailerRequestOptions = {},
): Promise<RenderedTrailer> {
  const repoKey = await resolveRepoKey(repoPath);
  expire(db, repoKey, config);

  const view = consolidate(db, repoKey, prompts.getUncommitted(db, repoKey));
  const promptIds = view.sessions.flatMap((s) => s.prompts.map((p) => p.id));
  return {
    repoKey,
    text: formatTrailer(view, { ...renderOptions(config), commentChar: opts.commentChar }),
    promptIds,
    mode: view.promptCount > 0 ? selectMode(view.promptCount, config.verboseThreshold) : null,
  };
}

/** Returns the number of prompts newly marked. */
export async function reconcileCommit(
  db: BetterSqlite3.Database,
  repoPath: string,
  commitHash: string,
  promptIds: string[],
): Promise<number> {
  const repoKey = await resolveRepoKey(repoPath);
  const result = reconcile(db, { repoKey, commitHash, promptIds });
  for (const sessionId of result.closedSessions) {
    debug(`Session ${sessionId} fully committed; closed`);
  }
  return result.marked;
}

export interface ManualMark {
  commitHash: string;
  marked: number;
}

/**
 * Attribute every prompt the repository currently shows as uncommitted to
 * `commitHash`, or to HEAD when none is given. Covers commits made while the
 * hooks were not installed.
 */
export async function markAllCommitted(
  db: BetterSqlite3.Database,
  repoPath: string,
  commitHash?: string,
  config: Config = DEFAULT_CONFIG,
): Promise<ManualMark> {
  const repoKey = await resolveRepoKey(repoPath);
  let hash = commitHash;
  if (!hash) {
    try {
      hash = await getHeadCommit(repoKey);
    } catch (err) {
      throw new PromptrailError(
        `Could not determine HEAD of ${repoKey}; pass a commit hash (${describeError(err)})`,
        'NO_COMMIT',
      );
    }
  }

  expire(db, repoKey, config);
  const promptIds = prompts.getUncommitted(db, repoKey).map((p) => p.id);
  const result = reconcile(db, { repoKey, commitHash: hash, promptIds });
  return { commitHash: hash, marked: result.marked };
}

export interface WorkingTreeStatus {
  repoKey: string;
  branch?: string;
  changedFiles: string[];
  diffStat: string;
}

/** Branch and tracked changes of the repository; null outside git. */
export async function getWorkingTree(repoPath: string): Promise<WorkingTreeStatus | null> {
  let root: string;
  try {
    root = await resolveRepoRoot(repoPath);
  } catch (err) {
    if (err instanceof ResolutionError) return null;
    throw err;
  }

  const branch = await getBranchName(root);
  try {
    const changes = await getWorkingTreeChanges(root);
    return { repoKey: root, branch, changedFiles: changes.files, diffStat: changes.stat };
  } catch (err) {
    // No commit yet to diff against
    debug(`git diff failed in ${root}: ${describeError(err)}`);
    return { repoKey: root, branch, changedFiles: [], diffStat: '' };
  }
}

export async function renderPrBody(
  db: BetterSqlite3.Database,
  repoPath: string,
  commitHashes: string[],
  config: Config = DEFAULT_CONFIG,
): Promise<string> {
  const repoKey = await resolveRepoKey(repoPath);
  expire(db, repoKey, config);
  const view = consolidate(db, repoKey, prompts.getByCommitRange(db, repoKey, commitHashes));
  return formatPrBody(view, renderOptions(config));
}

export async function listSessions(
  db: BetterSqlite3.Database,
  repoPath: string,
  limit = 10,
  config: Config = DEFAULT_CONFIG,
): Promise<SessionListing[]> {
  const repoKey = await resolveRepoKey(repoPath);
  expire(db, repoKey, config);
  return sessions.listSessions(db, repoKey, limit);
}

export async function getHistory(
  db: BetterSqlite3.Database,
  repoPath: string,
  limit = 10,
  config: Config = DEFAULT_CONFIG,
): Promise<SessionWithPrompts[]> {
  const repoKey = await resolveRepoKey(repoPath);
  expire(db, repoKey, config);
  return prompts.getHistory(db, repoKey, limit);
}

/**
 * Everything recorded for one session, looked up by id or unique id prefix.
 * Files inside the session's repository are shown relative to it.
 */
export function getSessionSummary(
  db: BetterSqlite3.Database,
  sessionId: string,
): SessionSummary {
  const session = sessions.findSessionByPrefix(db, sessionId);
  const sessionPrompts = prompts.getSessionPrompts(db, session.id);

  const tools: Record<string, number> = {};
  const files: string[] = [];
  for (const prompt of sessionPrompts) {
    for (const call of prompt.toolCalls) {
      tools[call.toolName] = (tools[call.toolName] ?? 0) + 1;
      if (call.filePath) {
        const rel = path.isAbsolute(call.filePath)
          ? relativeToRoot(session.repoKey, call.filePath)
          : call.filePath;
        files.push(rel ?? call.filePath);
      }
    }
  }

  return {
    session,
    hints: sessions.getSessionHints(db, session.id),
    prompts: sessionPrompts,
    files: dedupe(files),
    tools,
    links: getLinksForSession(db, session.id),
  };
}
