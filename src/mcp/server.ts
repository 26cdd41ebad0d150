import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { openDatabase } from '../store/index.js';
import { loadConfig } from '../config/config.js';
import { PROMPTRAIL_DB_PATH } from '../utils/paths.js';
import { info } from '../utils/logger.js';
import { registerSessionTools } from './tools/sessions.js';
import { registerUncommittedTools } from './tools/uncommitted.js';
import { registerConfigureTool } from './tools/configure.js';

export async function startMcpServer(dbPath: string = PROMPTRAIL_DB_PATH): Promise<void> {
  // Own connection: the CLI closes its shared store once the command returns
  const db = openDatabase(dbPath, { busyTimeoutMs: loadConfig().storeBusyTimeoutMs });

  const server = new McpServer({
    name: 'promptrail',
    version: '0.1.0',
  });

  registerSessionTools(server, db);
  registerUncommittedTools(server, db);
  registerConfigureTool(server);

  const transport = new StdioServerTransport();
  server.server.onclose = () => db.close();
  await server.connect(transport);

  info('promptrail MCP server running on stdio');
}
