import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type BetterSqlite3 from 'better-sqlite3';
import { loadConfig } from '../../config/config.js';
import {
  getUncommitted,
  getWorkingTree,
  markAllCommitted,
  renderCommitTrailer,
} from '../../provenance/index.js';

export function registerUncommittedTools(
  server: McpServer,
  db: BetterSqlite3.Database,
): void {
  server.tool(
    'promptrail_uncommitted',
    'Prompts not yet covered by a commit, grouped by session, with the branch and working-tree changes.',
    {
      repo_path: z.string().optional().describe('Repository path (defaults to the server cwd)'),
    },
    async (params) => {
      const repoPath = params.repo_path ?? process.cwd();
      const sessions = await getUncommitted(db, repoPath, loadConfig());
      const tree = await getWorkingTree(repoPath);

      const result = sessions.map((entry) => ({
        id: entry.session.id,
        origin: entry.linked ? entry.session.repoKey : null,
        prompts: entry.prompts.map((p) => ({
          text: p.text,
          timestamp: p.timestamp.toISOString(),
        })),
        files: entry.files,
      }));

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(
              {
                branch: tree?.branch ?? null,
                filesChanged: tree?.changedFiles ?? [],
                diffStat: tree?.diffStat ?? '',
                sessions: result,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );

  server.tool(
    'promptrail_commit_context',
    'The provenance trailer the next commit in a repository would receive.',
    {
      repo_path: z.string().optional().describe('Repository path (defaults to the server cwd)'),
      comment_char: z.string().min(1).optional().default('#').describe('Line prefix'),
    },
    async (params) => {
      const rendered = await renderCommitTrailer(
        db,
        params.repo_path ?? process.cwd(),
        loadConfig(),
        { commentChar: params.comment_char },
      );

      return {
        content: [
          {
            type: 'text' as const,
            text: rendered.text || 'No uncommitted prompts.',
          },
        ],
      };
    },
  );

  server.tool(
    'promptrail_mark_committed',
    'Attribute every uncommitted prompt of a repository to a commit made without the hooks.',
    {
      repo_path: z.string().optional().describe('Repository path (defaults to the server cwd)'),
      commit_hash: z.string().min(1).optional().describe('Commit hash (defaults to HEAD)'),
    },
    async (params) => {
      const result = await markAllCommitted(
        db,
        params.repo_path ?? process.cwd(),
        params.commit_hash,
        loadConfig(),
      );

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
