import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

/**
 * Stdio Transport
 *
 * 標準 MCP 傳輸方式，透過 stdin/stdout 與 LLM client 通訊。
 * client 斷開時呼叫 onClose（用來關閉 IGV socket）。
 */
export async function startStdioTransport(
  server: McpServer,
  onClose?: () => void,
): Promise<void> {
  const transport = new StdioServerTransport();
  transport.onclose = onClose;
  await server.connect(transport);
}
