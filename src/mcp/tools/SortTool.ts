import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { SORT_OPTIONS } from '../../domain/value-objects/SortOption.js';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleSort(
  deps: McpDependencies,
  args: { option?: string; locus?: string },
): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.sort(args.option, args.locus));
}

/** MCP Tool: igv_sort */
export function registerSortTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_sort',
    'Sort alignment rows at the current (or given) locus',
    {
      option: z.enum(SORT_OPTIONS).optional().describe('Sort option (default: base)'),
      locus: z.string().optional().describe('Locus to sort at'),
    },
    (args) => handleSort(deps, args),
  );
}
