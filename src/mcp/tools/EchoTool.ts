import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleEcho(deps: McpDependencies, args: { text?: string }): Promise<ToolResult> {
  return runOnSession(deps, (igv) => igv.echo(args.text));
}

/**
 * MCP Tool: igv_echo
 * 對應 CLI: igvctl echo [text]
 * 確認 IGV 有回應。
 */
export function registerEchoTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_echo',
    'Check that IGV is reachable; returns the given text, or "echo" when omitted',
    {
      text: z.string().optional().describe('Text for IGV to echo back'),
    },
    (args) => handleEcho(deps, args),
  );
}
