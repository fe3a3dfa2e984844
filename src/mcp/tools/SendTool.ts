import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { BatchCommand } from '../../domain/value-objects/BatchCommand.js';
import type { McpDependencies } from '../McpServer.js';
import { runOnSession, type ToolResult } from './runOnSession.js';

export function handleSend(deps: McpDependencies, args: { command: string }): Promise<ToolResult> {
  return runOnSession(deps, async (igv) => {
    const command = BatchCommand.parseLine(args.command);
    return igv.send(command.name, ...command.args);
  });
}

/**
 * MCP Tool: igv_send
 * 對應 CLI: igvctl send <words...>
 * 未包裝的 batch command 都從這裡送出。
 */
export function registerSendTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'igv_send',
    'Send any IGV batch command line, e.g. "setSleepInterval 200" or "colorBy TAG HP"',
    {
      command: z.string().min(1).describe('One batch command line'),
    },
    (args) => handleSend(deps, args),
  );
}
