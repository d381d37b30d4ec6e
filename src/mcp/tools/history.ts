/**
 * portwatch — MCP History Tools
 *
 * Read-only views of the per-address history.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { HistoryStore } from '../../engine/history-store.js';

export function registerHistoryTools(server: McpServer, history: HistoryStore): void {
  server.tool(
    'list_hosts',
    'List every address with recorded history: open port count, first and last seen',
    {},
    async () => {
      const hosts = Object.entries(history.snapshot())
        .map(([address, h]) => ({
          address,
          openPorts: h.ports.length,
          firstSeen: h.firstSeen,
          lastSeen: h.lastSeen,
        }))
        .sort((a, b) => a.address.localeCompare(b.address));
      return { content: [{ type: 'text', text: JSON.stringify(hosts, null, 2) }] };
    },
  );

  server.tool(
    'get_host',
    'Get the recorded ports and last known service banners of one address',
    {
      address: z.string().describe('IP address as reported by the sweeper'),
    },
    async ({ address }) => {
      const host = history.get(address);
      if (!host) {
        return {
          content: [{ type: 'text', text: `Host not found: ${address}` }],
          isError: true,
        };
      }
      return {
        content: [{ type: 'text', text: JSON.stringify({ address, ...host }, null, 2) }],
      };
    },
  );
}
