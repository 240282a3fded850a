import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RecordStore, SearchStrategy } from './types.js';
import { registerTools } from './tools.js';

export function createServer(store: RecordStore, search: SearchStrategy): McpServer {
  const server = new McpServer({
    name: 'package-records',
    version: '1.0.0',
  });

  registerTools(server, store, search);

  return server;
}
