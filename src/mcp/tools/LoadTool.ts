import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleLoad(
  deps: McpDependencies,
  args: { pathOrUrl: string; index?: string },
): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.load(args.pathOrUrl, { index: args.index }));
}

/**
 * MCP Tool: igv_load
 * 對應 CLI: igvctl load <pathOrUrl> [--index]
 * 本機路徑會轉為絕對路徑，URL 原樣傳給 IGV。
 */
export function registerLoadTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_load',
    'Load a data track (BAM, VCF, BED, bigWig ...) from a local path or URL',
    {
      pathOrUrl: z.string().min(1).describe('Local path or URL'),
      index: z.string().optional().describe('Index file path or URL'),
    },
    (args) => handleLoad(deps, args),
  );
}
