export interface Migration {
  version: number;
  description: string;
  up: string;
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Sessions, prompts and tool calls',
    up: `
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        repo_key TEXT NOT NULL,
        started_at TEXT NOT NULL,
        last_activity_at TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'open' CHECK (state IN ('open', 'closed')),
        closed_at TEXT
      );

      -- At most one open session per repository
      CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_one_open
        ON sessions(repo_key) WHERE state = 'open';
      CREATE INDEX IF NOT EXISTS idx_sessions_repo ON sessions(repo_key, started_at);

      CREATE TABLE IF NOT EXISTS session_hints (
        session_id TEXT NOT NULL REFERENCES sessions(id),
        hint TEXT NOT NULL,
        first_seen_at TEXT NOT NULL,
        PRIMARY KEY (session_id, hint)
      );

      CREATE INDEX IF NOT EXISTS idx_session_hints_hint ON session_hints(hint);

      CREATE TABLE IF NOT EXISTS prompts (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        session_id TEXT NOT NULL REFERENCES sessions(id),
        repo_key TEXT NOT NULL,
        text TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        committed INTEGER NOT NULL DEFAULT 0,
        commit_hash TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_prompts_session ON prompts(session_id);
      CREATE INDEX IF NOT EXISTS idx_prompts_uncommitted
        ON prompts(repo_key, committed) WHERE committed = 0;
      CREATE INDEX IF NOT EXISTS idx_prompts_commit ON prompts(commit_hash);

      CREATE TABLE IF NOT EXISTS tool_calls (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        prompt_id TEXT NOT NULL REFERENCES prompts(id),
        tool_name TEXT NOT NULL,
        file_path TEXT,
        called_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tool_calls_prompt ON tool_calls(prompt_id);
    `,
  },
  {
    version: 2,
    description: 'Cross-repository references',
    up: `
      CREATE TABLE IF NOT EXISTS repo_links (
        session_id TEXT NOT NULL REFERENCES sessions(id),
        target_repo_key TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (session_id, target_repo_key)
      );

      CREATE INDEX IF NOT EXISTS idx_repo_links_target ON repo_links(target_repo_key);

      CREATE TABLE IF NOT EXISTS repo_link_files (
        session_id TEXT NOT NULL,
        target_repo_key TEXT NOT NULL,
        file_path TEXT NOT NULL,
        added_at TEXT NOT NULL,
        PRIMARY KEY (session_id, target_repo_key, file_path),
        FOREIGN KEY (session_id, target_repo_key)
          REFERENCES repo_links(session_id, target_repo_key)
      );

      -- A prompt's own committed flag belongs to its origin repository;
      -- commits in a linked repository are recorded here.
      CREATE TABLE IF NOT EXISTS linked_commits (
        prompt_id TEXT NOT NULL REFERENCES prompts(id),
        target_repo_key TEXT NOT NULL,
        commit_hash TEXT NOT NULL,
        committed_at TEXT NOT NULL,
        PRIMARY KEY (prompt_id, target_repo_key)
      );

      CREATE INDEX IF NOT EXISTS idx_linked_commits_hash
        ON linked_commits(target_repo_key, commit_hash);
    `,
  },
  {
    version: 3,
    description: 'Branch names on sessions and references',
    up: `
      ALTER TABLE sessions ADD COLUMN branch TEXT;
      ALTER TABLE repo_links ADD COLUMN branch TEXT;
    `,
  },
];
