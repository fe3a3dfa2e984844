import type { Command } from 'commander';
import { IgvSession } from '../../application/IgvSession.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { loadCliConfig, readGlobalOptions, sessionOptions } from '../options.js';

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   igvctl mcp [--host 127.0.0.1] [--port 60151]
 *
 * 啟動時不連線；第一次呼叫 tool 才連上 IGV，斷線後下一次呼叫會重連。
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start an MCP server (stdio) exposing IGV batch commands as tools')
    .action(async (_opts: unknown, cmd: Command) => {
      const config = loadCliConfig(readGlobalOptions(cmd));
      const session = new IgvSession(sessionOptions(config));
      const server = createMcpServer({ session });

      await startStdioTransport(server, () => session.close());

      process.on('SIGINT', () => {
        session.close();
        process.exit(0);
      });
    });
}
