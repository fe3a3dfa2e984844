import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleGenome(deps: McpDependencies, args: { genome: string }): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.genome(args.genome));
}

/**
 * MCP Tool: igv_genome
 * 對應 CLI: igvctl genome <genome>
 */
export function registerGenomeTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_genome',
    'Load a reference genome by id (e.g. "hg38") or from a local file path',
    {
      genome: z.string().min(1).describe('Genome id or path'),
    },
    (args) => handleGenome(deps, args),
  );
}
