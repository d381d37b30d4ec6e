/**
 * portwatch — MCP Scan Tool
 *
 * Runs one configured target in one-shot mode and returns its change reports.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { Orchestrator } from '../../engine/orchestrator.js';

export function registerScanTool(server: McpServer, orchestrator: Orchestrator): void {
  server.tool(
    'scan_target',
    'Scan one configured target now and report new ports and changed services',
    {
      name: z.string().describe('Target name from the configuration'),
    },
    async ({ name }) => {
      const target = orchestrator.findTarget(name);
      if (!target) {
        return {
          content: [{ type: 'text', text: `Unknown target: ${name}` }],
          isError: true,
        };
      }

      const result = await orchestrator.runTarget(target, 'once');
      if (result.error !== undefined) {
        return {
          content: [{ type: 'text', text: `Scan of ${name} failed: ${result.error}` }],
          isError: true,
        };
      }
      return {
        content: [{ type: 'text', text: JSON.stringify(result.reports, null, 2) }],
      };
    },
  );
}
