import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type BetterSqlite3 from 'better-sqlite3';
import { loadConfig } from '../../config/config.js';
import { getSessionSummary, listSessions } from '../../provenance/index.js';

export function registerSessionTools(
  server: McpServer,
  db: BetterSqlite3.Database,
): void {
  server.tool(
    'promptrail_list_sessions',
    'List recorded prompt sessions for a repository, most recent first.',
    {
      repo_path: z.string().optional().describe('Repository path (defaults to the server cwd)'),
      limit: z.number().int().positive().optional().default(10).describe('Max sessions'),
    },
    async (params) => {
      const sessions = await listSessions(
        db,
        params.repo_path ?? process.cwd(),
        params.limit,
        loadConfig(),
      );

      const result = sessions.map((s) => ({
        id: s.id,
        state: s.state,
        branch: s.branch ?? null,
        startedAt: s.startedAt.toISOString(),
        lastActivityAt: s.lastActivityAt.toISOString(),
        prompts: s.totalPrompts,
        uncommitted: s.uncommittedPrompts,
      }));

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify({ sessions: result }, null, 2),
          },
        ],
      };
    },
  );

  server.tool(
    'promptrail_session_summary',
    'Prompts, touched files and tool usage of one session.',
    {
      session_id: z.string().min(1).describe('Session id or unique id prefix'),
    },
    async (params) => {
      const summary = getSessionSummary(db, params.session_id);

      const result = {
        id: summary.session.id,
        repository: summary.session.repoKey,
        state: summary.session.state,
        branch: summary.session.branch ?? null,
        prompts: summary.prompts.map((p) => ({
          text: p.text,
          timestamp: p.timestamp.toISOString(),
          commit: p.commitHash ?? null,
        })),
        files: summary.files,
        tools: summary.tools,
        linkedRepositories: summary.links.map((l) => ({
          repository: l.targetRepoKey,
          branch: l.branch ?? null,
        })),
      };

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    },
  );
}
