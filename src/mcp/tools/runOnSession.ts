import type { IgvResponse } from '../../application/IgvSession.js';
import { IgvClientError } from '../../domain/errors/DomainErrors.js';
import type { McpDependencies } from '../McpServer.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export const NO_RESPONSE_MESSAGE = 'IGV closed the connection without responding.';

function text(value: string, isError?: boolean): ToolResult {
  return isError
    ? { content: [{ type: 'text', text: value }], isError: true }
    : { content: [{ type: 'text', text: value }] };
}

/**
 * 所有 IGV tool 共用的執行流程
 *
 * - session 尚未連線或已斷線時先重新連線
 * - IgvClientError 轉為 isError 的 tool 結果，其他錯誤照常拋出
 * - IGV 的回應文字原樣回傳
 */
export async function runOnSession(
  deps: McpDependencies,
  run: (igv: McpDependencies['session']) => Promise<IgvResponse | undefined>,
): Promise<ToolResult> {
  try {
    if (deps.session.state !== 'connected') {
      await deps.session.connect();
    }
    const response = await run(deps.session);
    if (response === null) return text(NO_RESPONSE_MESSAGE, true);
    return text(response ?? 'Unchanged.');
  } catch (err) {
    if (err instanceof IgvClientError) {
      return text(`${err.code}: ${err.message}`, true);
    }
    throw err;
  }
}
