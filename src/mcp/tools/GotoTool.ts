import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleGoto(deps: McpDependencies, args: { loci: string[] }): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.goto(...args.loci));
}

/**
 * MCP Tool: igv_goto
 * 對應 CLI: igvctl goto <loci...>
 * 多個 locus 會以 split-screen 顯示。
 */
export function registerGotoTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_goto',
    'Navigate IGV to one or more loci (e.g. "chr1:1000-2000", "TP53")',
    {
      loci: z.array(z.string().min(1)).min(1).describe('Loci or feature names'),
    },
    (args) => handleGoto(deps, args),
  );
}
