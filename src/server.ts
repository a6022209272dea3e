import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DeckhandConfig } from './config.js';
import { registerManifestTools } from './tools/manifest.tools.js';
import { registerRunTools } from './tools/run.tools.js';

/**
 * @param config Runtime config; when omitted each tool call reads it from the environment
 */
export function createServer(config?: DeckhandConfig): McpServer {
  const server = new McpServer({
    name: 'deckhand',
    version: '0.1.0',
  });

  registerManifestTools(server, config);
  registerRunTools(server);

  return server;
}
