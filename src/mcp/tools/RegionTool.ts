import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export interface RegionArgs {
  chr: string;
  start: number;
  end: number;
  description?: string;
}

export function handleRegion(deps: McpDependencies, args: RegionArgs): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.region(args.chr, args.start, args.end, args.description));
}

/** MCP Tool: igv_region */
export function registerRegionTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_region',
    'Define a region of interest in IGV',
    {
      chr: z.string().min(1).describe('Chromosome'),
      start: z.number().int().nonnegative().describe('Start position'),
      end: z.number().int().nonnegative().describe('End position'),
      description: z.string().optional().describe('Region description'),
    },
    (args) => handleRegion(deps, args),
  );
}
