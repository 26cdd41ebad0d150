import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CONFIG_KEYS, getOrSetConfig } from '../../config/config.js';

export function registerConfigureTool(server: McpServer): void {
  server.tool(
    'promptrail_configure',
    `Read or set a promptrail setting (${CONFIG_KEYS.join(', ')}).`,
    {
      key: z.string().describe('Setting name'),
      value: z.number().optional().describe('New value; omit to read'),
    },
    async (params) => {
      const value = getOrSetConfig(params.key, params.value);
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify({ [params.key]: value }),
          },
        ],
      };
    },
  );
}
