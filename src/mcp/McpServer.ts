import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { IgvSession } from '../application/IgvSession.js';
import { registerEchoTool } from './tools/EchoTool.js';
import { registerGotoTool } from './tools/GotoTool.js';
import { registerRegionTool } from './tools/RegionTool.js';
import { registerGenomeTool } from './tools/GenomeTool.js';
import { registerLoadTool } from './tools/LoadTool.js';
import { registerSortTool } from './tools/SortTool.js';
import { registerSnapshotTool } from './tools/SnapshotTool.js';
import { registerSendTool } from './tools/SendTool.js';

/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊所有 IGV 工具。
 * 工具與 CLI 指令對應，共用同一個 IgvSession（同一條 batch port 連線）。
 */

export interface McpDependencies {
  session: IgvSession;
}

export const SERVER_VERSION = '0.1.0';

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'igvctl', version: SERVER_VERSION },
    { instructions: buildInstructions(deps.session.host, deps.session.port) },
  );

  // === 連線檢查 ===
  registerEchoTool(server, deps);

  // === 導覽與資料 ===
  registerGenomeTool(server, deps);
  registerLoadTool(server, deps);
  registerGotoTool(server, deps);
  registerRegionTool(server, deps);
  registerSortTool(server, deps);

  // === 輸出與通用 ===
  registerSnapshotTool(server, deps);
  registerSendTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(host: string, port: number): string {
  return [
    'igvctl: control a running IGV desktop instance through its batch command port.',
    '',
    'Available tools:',
    '- igv_echo: Check that IGV answers',
    '- igv_genome: Load a reference genome (id such as hg38, or a file path)',
    '- igv_load: Load a data track from a path or URL',
    '- igv_goto: Navigate to loci',
    '- igv_region: Mark a region of interest',
    '- igv_sort: Sort alignments (base, position, strand, quality, sample, readGroup)',
    '- igv_snapshot: Save an image of the current view',
    '- igv_send: Send any other batch command line',
    '',
    'Recommended workflow:',
    '1. igv_echo to confirm IGV is running',
    '2. igv_genome, then igv_load for each track',
    '3. igv_goto to the locus of interest',
    '4. igv_snapshot to save the view',
    '',
    'IGV replies with plain text: usually "OK" on success, free-form text on error.',
    '',
    `IGV batch port: ${host}:${port}`,
  ].join('\n');
}
