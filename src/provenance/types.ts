export type SessionState = 'open' | 'closed';

export interface ToolCall {
  toolName: string;
  /** Absolute, or relative to the repository root when the caller had no cwd. */
  filePath?: string;
  calledAt: Date;
}

export interface ToolCallInput {
  toolName: string;
  filePath?: string;
  calledAt?: Date;
}

export interface Prompt {
  id: string;
  /** Insertion order; breaks ties between equal timestamps. */
  seq: number;
  sessionId: string;
  repoKey: string;
  text: string;
  timestamp: Date;
  toolCalls: ToolCall[];
  committed: boolean;
  commitHash?: string;
}

export interface Session {
  id: string;
  repoKey: string;
  startedAt: Date;
  lastActivityAt: Date;
  state: SessionState;
  closedAt?: Date;
  /** Branch checked out when the session last received a prompt. */
  branch?: string;
}

export interface SessionWithPrompts extends Session {
  prompts: Prompt[];
}

export interface SessionListing extends Session {
  totalPrompts: number;
  uncommittedPrompts: number;
}

/** Attributes a session's prompts to a repository other than its own. */
export interface RepoLink {
  sessionId: string;
  targetRepoKey: string;
  files: string[];
  createdAt: Date;
  /** Branch checked out in the target when the reference was made. */
  branch?: string;
}

export interface ConsolidatedSession {
  session: Session;
  prompts: Prompt[];
  /** Repository-relative, de-duplicated, first-seen order. */
  files: string[];
  /** True when the session belongs to another repository and reached this one through a link. */
  linked: boolean;
}

export interface ConsolidatedView {
  repoKey: string;
  sessions: ConsolidatedSession[];
  promptCount: number;
  files: string[];
}

export interface SessionSummary {
  session: Session;
  hints: string[];
  prompts: Prompt[];
  files: string[];
  tools: Record<string, number>;
  links: RepoLink[];
}
