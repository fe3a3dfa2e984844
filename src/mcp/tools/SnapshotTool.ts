import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleSnapshot(deps: McpDependencies, args: { path?: string }): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.snapshot(args.path));
}

/**
 * MCP Tool: igv_snapshot
 * 對應 CLI: igvctl snapshot [file]
 * 帶目錄的路徑會暫時切換 IGV 的 snapshot 目錄，存完再切回。
 */
export function registerSnapshotTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_snapshot',
    'Save an image of the current IGV view (.png or .svg)',
    {
      path: z.string().optional().describe('Output file path; omitted = IGV chooses the name'),
    },
    (args) => handleSnapshot(deps, args),
  );
}
