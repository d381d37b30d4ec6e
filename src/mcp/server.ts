/**
 * portwatch — MCP Server
 *
 * Creates and configures the MCP server with the history and scan tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HistoryStore } from '../engine/history-store.js';
import type { Orchestrator } from '../engine/orchestrator.js';
import { registerHistoryTools } from './tools/history.js';
import { registerScanTool } from './tools/scan.js';

export const SERVER_VERSION = '0.1.0';

export interface McpServerDeps {
  history: HistoryStore;
  orchestrator: Orchestrator;
}

/**
 * Create a fully configured MCP server with all portwatch tools.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: 'portwatch',
    version: SERVER_VERSION,
  });

  registerHistoryTools(server, deps.history); // list_hosts + get_host
  registerScanTool(server, deps.orchestrator);

  return server;
}
